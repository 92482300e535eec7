import type { TokenProvider } from "./types.js";

export const DEFAULT_TOKEN_ENV = "BLOGSYNC_ACCESS_TOKEN";

export function createStaticTokenProvider(token: string): TokenProvider {
  return {
    async getAccessToken() {
      return token;
    },
  };
}

/**
 * Reads the token from an environment variable on every call, so a
 * supervisor can rotate it without restarting the process.
 */
export function createEnvTokenProvider(
  varName: string = DEFAULT_TOKEN_ENV,
  env: NodeJS.ProcessEnv = process.env,
): TokenProvider {
  return {
    async getAccessToken() {
      const token = env[varName];
      if (!token) {
        throw new Error(`Access token not set: ${varName} is empty`);
      }
      return token;
    },
  };
}

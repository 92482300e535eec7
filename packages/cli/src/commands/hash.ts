import { hashFile } from "@blogsync/core/hashing";

export async function hashCommand(file: string): Promise<void> {
  console.log(await hashFile(file));
}

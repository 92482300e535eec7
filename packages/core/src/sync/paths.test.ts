import { describe, it, expect } from "vitest";
import { join, resolve } from "node:path";
import { localPathFor, relativeRemotePath } from "./paths.js";
import { PathOutsideRootError } from "../errors/catalog.js";

describe("relativeRemotePath", () => {
  it("strips the remote root", () => {
    expect(relativeRemotePath("/Blog/posts/a.md", "/Blog")).toBe("posts/a.md");
  });

  it("ignores case when matching the root", () => {
    expect(relativeRemotePath("/Blog/a.md", "/blog")).toBe("a.md");
  });

  it("tolerates a trailing slash on the root", () => {
    expect(relativeRemotePath("/Blog/a.md", "/Blog/")).toBe("a.md");
  });

  it("only strips on a segment boundary", () => {
    expect(relativeRemotePath("/Blogroll/a.md", "/Blog")).toBe("Blogroll/a.md");
  });

  it("strips only the leading slash for the root folder", () => {
    expect(relativeRemotePath("/a.txt", "/")).toBe("a.txt");
    expect(relativeRemotePath("/a.txt", "")).toBe("a.txt");
  });
});

describe("localPathFor", () => {
  it("joins onto the base directory", () => {
    expect(localPathFor("/Blog/posts/a.md", "/Blog", "/srv/site")).toBe(
      join(resolve("/srv/site"), "posts", "a.md"),
    );
  });

  it("resolves a relative base to an absolute path", () => {
    expect(localPathFor("/a.txt", "/", "sync")).toBe(resolve("sync", "a.txt"));
  });

  it("rejects paths that escape the base", () => {
    expect(() => localPathFor("/Blog/../../etc/passwd", "/Blog", "/srv/site"))
      .toThrow(PathOutsideRootError);
  });

  it("rejects the root folder itself", () => {
    expect(() => localPathFor("/Blog", "/Blog", "/srv/site")).toThrow(
      PathOutsideRootError,
    );
  });
});

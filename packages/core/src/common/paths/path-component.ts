import { PathComponentError } from "../../errors/tree-entry-errors.js";

/**
 * Validate a single path component (an entry name)
 *
 * A component is non-empty, is neither "." nor "..", and contains no
 * path separator or NUL byte.
 *
 * @throws PathComponentError if the name is not a valid component
 */
export function validatePathComponent(name: string): void {
  if (name === "") {
    throw new PathComponentError("Path component cannot be empty", name);
  }
  if (name === "." || name === "..") {
    throw new PathComponentError(`Path component cannot be '${name}'`, name);
  }
  if (name.includes("/")) {
    throw new PathComponentError("Path component cannot contain '/'", name);
  }
  if (name.includes("\0")) {
    throw new PathComponentError("Path component cannot contain null bytes", name);
  }
}

export function isPathComponent(name: string): boolean {
  return name !== "" && name !== "." && name !== ".." && !/[/\0]/.test(name);
}

import type { DocumentPathAdapter } from "./types.js";

const splitSegments = (value: string): string[] =>
  value.replace(/\\/g, "/").split("/").filter(Boolean);

const normalizeSegments = (segments: readonly string[]): string[] =>
  segments.reduce<string[]>((normalized, segment) => {
    if (segment === ".") return normalized;
    if (segment === "..") return normalized.slice(0, -1);
    return [...normalized, segment];
  }, []);

/** Absolute POSIX paths rooted at `/`; enough for in-memory hosts. */
export const joinPosix = (...parts: string[]): string => {
  const segments = parts.reduce<string[]>((acc, part) => {
    if (!part) return acc;
    return part.startsWith("/")
      ? splitSegments(part)
      : [...acc, ...splitSegments(part)];
  }, []);
  return `/${normalizeSegments(segments).join("/")}`;
};

export const dirnamePosix = (value: string): string => {
  const segments = normalizeSegments(splitSegments(value));
  return `/${segments.slice(0, -1).join("/")}`;
};

export const createPosixPathAdapter = (): DocumentPathAdapter => ({
  resolve: (path) => joinPosix(path),
  join: joinPosix,
  dirname: dirnamePosix,
});

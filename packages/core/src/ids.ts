/**
 * Run ids and artifact URIs.
 */
import { randomUUID } from "node:crypto";

/** 32 lowercase hex chars. */
export function newRunId(): string {
  return randomUUID().replace(/-/g, "");
}

/**
 * Joins URI segments with single slashes without normalizing the scheme, so
 * `s3://bucket` + `3` stays `s3://bucket/3`.
 */
export function joinUri(base: string, ...segments: string[]): string {
  let out = base.replace(/\/+$/, "");
  for (const seg of segments) {
    const trimmed = seg.replace(/^\/+|\/+$/g, "");
    if (trimmed) out = `${out}/${trimmed}`;
  }
  return out;
}

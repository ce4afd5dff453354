import { createHash, type Hash } from "node:crypto";

export const SRI_SHA256 = /^sha256-[A-Za-z0-9+/]{43}=$/;

/** Encode a finished sha256 hash as an SRI string (`sha256-<base64>`). */
export function toSri(hash: Hash): string {
  return `sha256-${hash.digest("base64")}`;
}

export function sriFromContent(content: string | Buffer): string {
  return toSri(createHash("sha256").update(content));
}

export function isSriSha256(value: string): boolean {
  return SRI_SHA256.test(value);
}

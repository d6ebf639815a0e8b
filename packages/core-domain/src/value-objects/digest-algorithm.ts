export const DIGEST_ALGORITHMS = ["MD5", "SHA-1", "SHA-224", "SHA-256"] as const;

export type DigestAlgorithm = (typeof DIGEST_ALGORITHMS)[number];

export const DEFAULT_DIGEST_ALGORITHM: DigestAlgorithm = "MD5";

export function isDigestAlgorithm(name: string): name is DigestAlgorithm {
  return (DIGEST_ALGORITHMS as readonly string[]).includes(name);
}

export type FileDigest = {
  algorithm: DigestAlgorithm;
  value: string; // lowercase hex
};

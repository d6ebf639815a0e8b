import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

import {
  DEFAULT_DIGEST_ALGORITHM,
  isDigestAlgorithm,
  type DigestAlgorithm,
} from "@inbox-sorter/core-domain";
import type { FileHasher, FileHash } from "../ports/file-hasher";
import { IOError } from "../application/errors";

export const HASH_CHUNK_SIZE = 4096;

const NODE_ALGORITHMS: Record<DigestAlgorithm, string> = {
  MD5: "md5",
  "SHA-1": "sha1",
  "SHA-224": "sha224",
  "SHA-256": "sha256",
};

/** Unknown names fall back to MD5 instead of failing. */
export function resolveDigestAlgorithm(name: string): DigestAlgorithm {
  return isDigestAlgorithm(name) ? name : DEFAULT_DIGEST_ALGORITHM;
}

export class NodeFileHasher implements FileHasher {
  async hashFile(absolutePath: string, algorithm: string): Promise<FileHash> {
    const algo = resolveDigestAlgorithm(algorithm);

    return new Promise((resolve, reject) => {
      const hash = createHash(NODE_ALGORITHMS[algo]);
      const stream = createReadStream(absolutePath, { highWaterMark: HASH_CHUNK_SIZE });

      stream.on("data", (chunk) => hash.update(chunk));
      stream.on("error", (err) => {
        reject(new IOError(`Failed to read file for hashing: ${absolutePath}`, absolutePath, err));
      });
      stream.on("end", () => {
        resolve({ algorithm: algo, value: hash.digest("hex") });
      });
    });
  }
}

import type { IdentificationResult } from "../../types";
import type { UploadSet } from "../../utils/fileValidation";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface ImageIdentifier {
  /**
   * Resolves with the normalized result, or rejects with an `UpstreamError` whose kind tells
   * whether the failure is worth retrying.
   */
  identify(uploadSet: UploadSet): Promise<IdentificationResult>;
  getName(): string;
}

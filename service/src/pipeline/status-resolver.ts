import type { PublicStatus } from "../types.js";

const STATUS_MAPPING: Record<string, PublicStatus> = {
  APPROVED: "approved",
  REJECTED: "rejected",
  NEEDS_REVIEW: "needs_review",
};

/**
 * Maps a model verdict to the public status vocabulary.
 * Unrecognized or absent verdicts resolve to needs_review, never to an approval.
 */
export function resolveStatus(status: string | null | undefined): PublicStatus {
  if (status && Object.hasOwn(STATUS_MAPPING, status)) {
    return STATUS_MAPPING[status];
  }
  return "needs_review";
}

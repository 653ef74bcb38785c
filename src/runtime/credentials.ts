import { execCapture } from "../utils/process.js";

/**
 * Token from the GitHub CLI. Empty if gh is missing or logged out.
 */
export function getGhToken(): string {
  const result = execCapture("gh", ["auth", "token"]);
  if (result.status !== 0) return "";
  return result.stdout.trim();
}

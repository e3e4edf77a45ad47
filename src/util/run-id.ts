import { randomBytes } from "node:crypto";

/** Generate an 8-char hex loop ID */
export function generateRunId(): string {
  return randomBytes(4).toString("hex");
}

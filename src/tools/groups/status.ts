import type { ProgressSnapshot } from "@/pipeline";
import type { DreamGroupSession } from "@/session";

export function getRunStatus(session: DreamGroupSession): ProgressSnapshot {
  return session.status.current();
}

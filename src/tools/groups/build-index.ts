import type { BuildIndexResult } from "@/search";
import type { DreamGroupSession } from "@/session";

export async function buildIndex(
  session: DreamGroupSession,
): Promise<BuildIndexResult> {
  return session.buildIndex();
}

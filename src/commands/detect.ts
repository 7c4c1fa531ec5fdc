import path from "node:path";
import { isDirectory } from "../detection/fs-walk.js";
import { loadContext, type ContextOptions } from "./context.js";

export type DetectResult = { ok: true; project: string; frameworks: string[] } | { ok: false; error: string };

/** Names of every enabled adapter that recognizes the project. */
export async function detect(opts: { project: string } & ContextOptions): Promise<DetectResult> {
  const project = path.resolve(opts.project);
  if (!isDirectory(project)) return { ok: false, error: `Project directory not found: ${project}` };

  const ctx = await loadContext(opts);
  if (!ctx.ok) return ctx;

  return { ok: true, project, frameworks: ctx.registry.detectAll(project).map((a) => a.name) };
}

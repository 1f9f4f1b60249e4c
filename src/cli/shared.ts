import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { loadTemplate } from "../compliance/template-loader.js";
import type { ComplianceTemplate } from "../compliance/types.js";

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Read a template file from disk and hand its text to the loader. */
export async function readTemplate(path: string): Promise<ComplianceTemplate> {
  const source = await readFile(resolve(path), "utf-8");
  return loadTemplate(source);
}

import { readFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { z } from "zod";
import { WorkItemSchema, type WorkItem } from "../schemas/work-item.js";
import { resolveFrom } from "../config/paths.js";
import { PlanError, errnoCode, errorMessage } from "../errors/catalog.js";

export interface ParsePlanOptions {
  /** Directory relative target paths are resolved against (default: cwd) */
  baseDir?: string;
}

export interface LoadPlanOptions {
  /** Default: the plan file's own directory */
  baseDir?: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.map(String).join(".") || "(item)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse a work plan: either a JSON array of work items or one JSON object
 * per line (blank lines and lines starting with "#" are skipped). Target
 * paths are resolved to absolute paths.
 */
export function parsePlan(text: string, options: ParsePlanOptions = {}): WorkItem[] {
  const baseDir = options.baseDir ?? process.cwd();
  const toItem = (raw: unknown, where: Record<string, number>, label: string): WorkItem => {
    const result = WorkItemSchema.safeParse(raw);
    if (!result.success) {
      throw new PlanError(`Invalid work item at ${label}: ${describeIssues(result.error)}`, where);
    }
    return Object.freeze({
      ...result.data,
      targetPath: resolveFrom(baseDir, result.data.targetPath),
    });
  };

  if (text.trimStart().startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new PlanError(`Plan is not valid JSON: ${errorMessage(err)}`);
    }
    if (!Array.isArray(parsed)) {
      throw new PlanError("Plan must be a JSON array of work items");
    }
    return parsed.map((raw: unknown, index) => toItem(raw, { index }, `index ${index}`));
  }

  const items: WorkItem[] = [];
  text.split(/\r?\n/).forEach((content, i) => {
    const line = i + 1;
    const trimmed = content.trim();
    if (trimmed === "" || trimmed.startsWith("#")) return;

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (err) {
      throw new PlanError(`Invalid JSON at line ${line}: ${errorMessage(err)}`, { line });
    }
    items.push(toItem(raw, { line }, `line ${line}`));
  });
  return items;
}

/** Read and parse a plan file. Throws PlanError. */
export async function loadPlan(
  path: string,
  options: LoadPlanOptions = {},
): Promise<WorkItem[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new PlanError(`Cannot read plan file: ${errorMessage(err)}`, {
      path,
      code: errnoCode(err),
    });
  }
  return parsePlan(text, { baseDir: options.baseDir ?? dirname(path) });
}

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { WorkflowFormatError, type Step } from '../types/index.js';
import { WorkflowSchema } from '../schemas/index.js';
import { cloneSteps } from '../model/steps.js';

/** Parse and validate a workflow document. Returned steps are frozen. */
export function parseWorkflow(json: string): Step[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WorkflowFormatError(`Workflow is not valid JSON (${reason})`, []);
  }

  const parsed = WorkflowSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new WorkflowFormatError('Invalid workflow', issues);
  }

  return cloneSteps(parsed.data);
}

export function serializeWorkflow(steps: readonly Step[]): string {
  return JSON.stringify(steps, null, 4);
}

export async function loadWorkflow(filePath: string): Promise<Step[]> {
  const json = await readFile(filePath, 'utf-8');
  return parseWorkflow(json);
}

export async function saveWorkflow(filePath: string, steps: readonly Step[]): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, serializeWorkflow(steps), 'utf-8');
}

/** Paths of the `*.json` presets in `dir`, sorted by file name. Creates `dir` if missing. */
export async function listPresets(dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.json'))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

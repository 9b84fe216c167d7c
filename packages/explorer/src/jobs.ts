/**
 * Job files
 *
 * A job file is JSON: either `{ "jobs": [...] }` or a bare array. Entries are
 * validated one at a time; a bad entry or an unreadable file is reported and
 * skipped without affecting the rest of the run.
 */

import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { toError } from '@roamer/shared';
import type { JobDescriptor } from './types.js';

export const JobEntrySchema = z.object({
  id: z.string().min(1).optional(),
  app: z.string().min(1, 'app package name is required'),
  entryActivity: z.string().min(1).optional(),
  device: z
    .object({
      serial: z.string().min(1).optional(),
      tags: z.array(z.string()).default([]),
    })
    .default({}),
  stepBudget: z.number().int().positive().optional(),
  timeBudgetMs: z.number().int().positive().optional(),
  goal: z
    .object({
      screen: z.string().min(1).optional(),
      description: z.string().min(1).optional(),
    })
    .optional(),
  /** Screen to replay a recorded path to before exploring */
  startScreen: z.string().min(1).optional(),
  /** Run the same job this many times */
  rounds: z.number().int().positive().default(1),
});

export type JobEntry = z.infer<typeof JobEntrySchema>;

const JobFileSchema = z.union([z.array(z.unknown()), z.object({ jobs: z.array(z.unknown()) })]);

export interface JobIssue {
  source: string;
  /** Entry position within the file; absent for whole-file problems */
  index?: number;
  message: string;
}

export interface LoadedJobs {
  jobs: JobDescriptor[];
  issues: JobIssue[];
}

function expandEntry(entry: JobEntry, defaultId: string, source: string): JobDescriptor[] {
  const baseId = entry.id ?? defaultId;
  const descriptors: JobDescriptor[] = [];

  for (let round = 1; round <= entry.rounds; round++) {
    descriptors.push({
      id: entry.rounds > 1 ? `${baseId}@r${round}` : baseId,
      app: { packageName: entry.app, entryActivity: entry.entryActivity },
      selector: { serial: entry.device.serial, tags: entry.device.tags },
      stepBudget: entry.stepBudget,
      timeBudgetMs: entry.timeBudgetMs,
      goal: entry.goal,
      startScreen: entry.startScreen,
      source,
    });
  }
  return descriptors;
}

/**
 * Validate already-parsed job file content.
 */
export function parseJobs(content: unknown, source: string): LoadedJobs {
  const file = JobFileSchema.safeParse(content);
  if (!file.success) {
    return {
      jobs: [],
      issues: [{ source, message: 'Expected an array of jobs or an object with a "jobs" array' }],
    };
  }

  const entries = Array.isArray(file.data) ? file.data : file.data.jobs;
  const stem = path.basename(source, path.extname(source));
  const jobs: JobDescriptor[] = [];
  const issues: JobIssue[] = [];

  entries.forEach((raw, index) => {
    const parsed = JobEntrySchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'entry'}: ${issue.message}`);
      issues.push({ source, index, message: details.join('; ') });
      return;
    }
    jobs.push(...expandEntry(parsed.data, `${stem}#${index}`, source));
  });

  return { jobs, issues };
}

/**
 * Load and validate one or more job files. Duplicate job ids are reported and
 * only the first occurrence is kept.
 */
export async function loadJobFiles(files: string[]): Promise<LoadedJobs> {
  const jobs: JobDescriptor[] = [];
  const issues: JobIssue[] = [];
  const seen = new Set<string>();

  for (const file of files) {
    let content: unknown;
    try {
      content = await fs.readJson(file);
    } catch (error) {
      issues.push({ source: file, message: `Could not read job file: ${toError(error).message}` });
      continue;
    }

    const loaded = parseJobs(content, file);
    issues.push(...loaded.issues);

    for (const job of loaded.jobs) {
      if (seen.has(job.id)) {
        issues.push({ source: file, message: `Duplicate job id "${job.id}" skipped` });
        continue;
      }
      seen.add(job.id);
      jobs.push(job);
    }
  }

  return { jobs, issues };
}

import { z } from 'zod';
import { isJsonObject, type JsonObject, type JsonValue } from '@hpcpulse/shared';

import { IngestionError } from './errors';
import { parseSchedulerOutput, type LineRepair } from './sanitizer';

export const SCHEDULER_QUERIES = ['server', 'queues', 'nodes', 'jobs'] as const;
export type SchedulerQuery = (typeof SCHEDULER_QUERIES)[number];

/** Raw text of the four PBS introspection commands. */
export type RawSchedulerOutput = Record<SchedulerQuery, string>;

const jsonObjectSchema = z.custom<JsonObject>(isJsonObject, { message: 'Expected a JSON object' });
const recordMapSchema = z.record(z.string(), jsonObjectSchema);

export const serverOutputSchema = z
  .object({
    timestamp: z.number().optional(),
    pbs_version: z.string().optional(),
    pbs_server: z.string().min(1),
    Server: recordMapSchema.default({})
  })
  .passthrough();

export const queueOutputSchema = z.object({ Queue: recordMapSchema.default({}) }).passthrough();
export const nodeOutputSchema = z.object({ nodes: recordMapSchema.default({}) }).passthrough();
export const jobOutputSchema = z.object({ Jobs: recordMapSchema.default({}) }).passthrough();

export type ServerOutput = z.infer<typeof serverOutputSchema>;
export type QueueOutput = z.infer<typeof queueOutputSchema>;
export type NodeOutput = z.infer<typeof nodeOutputSchema>;
export type JobOutput = z.infer<typeof jobOutputSchema>;

export type SchedulerSnapshot = {
  server: ServerOutput;
  queues: QueueOutput;
  nodes: NodeOutput;
  jobs: JobOutput;
};

export type ParseSnapshotOptions = {
  onRepair?: (query: SchedulerQuery, repair: LineRepair) => void;
};

function parseQuery<T>(query: SchedulerQuery, text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: ParseSnapshotOptions): T {
  const parsed = parseSchedulerOutput(text, {
    source: query,
    onRepair: options.onRepair ? (repair) => options.onRepair?.(query, repair) : undefined
  });
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const [issue] = result.error.issues;
    const location = issue && issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new IngestionError(query, `unexpected scheduler output at ${location}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

export function parseSnapshot(raw: RawSchedulerOutput, options: ParseSnapshotOptions = {}): SchedulerSnapshot {
  return {
    server: parseQuery('server', raw.server, serverOutputSchema, options),
    queues: parseQuery('queues', raw.queues, queueOutputSchema, options),
    nodes: parseQuery('nodes', raw.nodes, nodeOutputSchema, options),
    jobs: parseQuery('jobs', raw.jobs, jobOutputSchema, options)
  };
}

export function readSection(record: JsonObject, key: string): JsonObject | null {
  const value = record[key];
  return isJsonObject(value) ? value : null;
}

export function readString(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/** Non-negative integer resource count; PBS reports most as numbers, some as strings. */
export function readCount(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

export function readResource(record: JsonObject, section: string, name: string): JsonValue | undefined {
  return readSection(record, section)?.[name];
}

import type { JsonObject } from '@hpcpulse/shared';

export const DOCUMENT_SUBJECTS = ['Server', 'Queue', 'Jobs', 'nodes'] as const;
export type DocumentSubject = (typeof DOCUMENT_SUBJECTS)[number];

export const APP_REGISTRY_KEY = 'app';

/** Document published once per pass under {@link siteDocumentKey}. */
export type PbsDocument = {
  /** Pass start, epoch seconds. */
  timestamp: number;
  pbs_version: string | null;
  pbs_server: string;
  Server: Record<string, JsonObject>;
  Queue: Record<string, JsonObject>;
  nodes: Record<string, JsonObject>;
  Jobs: Record<string, JsonObject>;
};

export function siteDocumentKey(site: string): string {
  return `pbs_${site}`;
}

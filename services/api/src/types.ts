import type { DocumentStore } from '@hpcpulse/document-store';

import type { ApiConfig } from './config';
import type { SiteDocuments } from './siteDocuments';

export interface AppContext {
  config: ApiConfig;
  store: DocumentStore;
  documents: SiteDocuments;
}

import { z } from 'zod';
import { DraftState } from '../constants';
import {
  commitRecordSchema,
  datasetRecordSchema,
  draftRecordSchema,
  namedCommitRecordSchema,
} from './schemas';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

/** The entity a request addresses; used to word not-found errors. */
export interface ResourceRef {
  resource: string;
  identification: string | number;
}

export interface RequestOptions {
  params?: QueryParams;
  json?: Record<string, JsonValue | undefined>;
  resource?: ResourceRef;
}

export type DatasetRecord = z.output<typeof datasetRecordSchema>;
export type CommitRecord = z.output<typeof commitRecordSchema>;
export type NamedCommitRecord = z.output<typeof namedCommitRecordSchema>;
export type DraftRecord = z.output<typeof draftRecordSchema>;

export interface PageRequest {
  offset: number;
  limit: number;
}

export type CreateDatasetParams = {
  alias?: string;
  isPublic?: boolean;
  config?: string | null;
};

export type CreateDraftParams = {
  description?: string;
  branch?: string;
};

export type EditDraftParams = {
  title?: string;
  description?: string;
};

// 'ALL' lists drafts in every state; omitting the filter lists open drafts.
export type DraftStateFilter = DraftState | 'ALL';

export type ListDraftsParams = {
  state?: DraftStateFilter;
  branch?: string;
};

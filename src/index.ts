export { Platform } from './platform';
export { resolveConfig } from './config';
export { HttpClient } from './client/httpClient';
export type { HttpClientParams } from './client/httpClient';
export { LazyPagingList } from './manager/lazy';
export type { Page, PageFetcher } from './manager/lazy';
export { Dataset, DatasetManager } from './manager/dataset';
export { Branch, BranchManager } from './manager/branch';
export { Tag, TagManager } from './manager/tag';
export { Commit, CommitManager, NamedCommit } from './manager/commit';
export { Draft, DraftManager } from './manager/draft';
export { DraftState, SDK_VERSION } from './constants';
export {
  StrataError,
  ConfigurationError,
  IndexOutOfRangeError,
  APIError,
  ResourceNotExistError,
  AuthError,
  ValidationError,
  ServerError,
  NetworkError,
  ResponseFormatError,
} from './errors';
export type { StrataConfig, PlatformParams } from './types';
export type {
  CreateDatasetParams,
  CreateDraftParams,
  EditDraftParams,
  ListDraftsParams,
  DraftStateFilter,
  JsonValue,
} from './client/types';

import type { Dataset } from './dataset';
import { CommitResource } from '../client/resources/commit';
import { DraftResource } from '../client/resources/draft';
import { CreateDraftParams, DraftRecord, EditDraftParams, ListDraftsParams } from '../client/types';
import { DEFAULT_PAGE_LIMIT, DraftState } from '../constants';
import { ResourceNotExistError } from '../errors';
import { info } from '../utils/logger';
import { LazyPagingList, Page } from './lazy';

/**
 * A draft is an editable change set on top of a branch. It ends either
 * closed or committed.
 */
export class Draft {
  readonly number: number;
  readonly branch: string;
  readonly parentCommitId: string | null;
  readonly creator: string;
  readonly createdAt: string;
  title: string;
  description: string;
  state: DraftState;
  updatedAt: string;

  constructor(readonly dataset: Dataset, record: DraftRecord) {
    this.number = record.number;
    this.title = record.title;
    this.branch = record.branch;
    this.state = record.state;
    this.parentCommitId = record.parentCommitId;
    this.creator = record.creator;
    this.createdAt = record.createdAt;
    this.updatedAt = record.updatedAt;
    this.description = record.description;
  }

  private get resource(): DraftResource {
    return new DraftResource(this.dataset.http, this.dataset.owner, this.dataset.name);
  }

  /** Update title and/or description; fields left undefined are not sent. */
  async edit(update: EditDraftParams): Promise<void> {
    const record = await this.resource.updateDraft(this.number, update);
    if (update.title !== undefined) this.title = update.title;
    if (update.description !== undefined) this.description = update.description;
    this.updatedAt = record.updatedAt;
  }

  async close(): Promise<void> {
    const record = await this.resource.updateDraft(this.number, { state: DraftState.CLOSED });
    this.state = DraftState.CLOSED;
    this.updatedAt = record.updatedAt;
    info(`Closed draft #${this.number} of dataset ${this.dataset.owner}/${this.dataset.name}`);
  }

  async commit(title: string, description: string = ''): Promise<void> {
    const commits = new CommitResource(this.dataset.http, this.dataset.owner, this.dataset.name);
    const record = await commits.commitDraft(this.number, title, description);
    this.state = DraftState.COMMITTED;
    info(`Committed draft #${this.number} as ${record.commitId}`);
  }

  toString(): string {
    return `Draft("#${this.number}: ${this.title}")`;
  }
}

export class DraftManager {
  private readonly resource: DraftResource;

  constructor(private readonly dataset: Dataset) {
    this.resource = new DraftResource(dataset.http, dataset.owner, dataset.name);
  }

  /** Open a draft on `params.branch`, or on the checked-out branch. */
  async create(title: string, params: CreateDraftParams = {}): Promise<Draft> {
    const record = await this.resource.createDraft(title, {
      ...params,
      branch: params.branch ?? this.dataset.branch ?? undefined,
    });
    info(`Created draft #${record.number} in dataset ${this.dataset.owner}/${this.dataset.name}`);
    return new Draft(this.dataset, record);
  }

  /** @throws ResourceNotExistError if `draftNumber` is not a positive integer or unknown */
  async get(draftNumber: number): Promise<Draft> {
    if (!Number.isInteger(draftNumber) || draftNumber <= 0) {
      throw new ResourceNotExistError('draft', draftNumber);
    }
    const record = await this.resource.getDraft(draftNumber);
    return new Draft(this.dataset, record);
  }

  /**
   * List drafts. Without a state filter the platform returns open drafts;
   * without a branch filter, drafts of every branch.
   */
  list(filters: ListDraftsParams = {}): LazyPagingList<Draft> {
    const captured = { ...filters };
    return new LazyPagingList((offset, limit) => this.fetchPage(captured, offset, limit), DEFAULT_PAGE_LIMIT);
  }

  private async fetchPage(filters: ListDraftsParams, offset: number, limit: number): Promise<Page<Draft>> {
    const { items, totalCount } = await this.resource.listDrafts({ offset, limit }, filters);
    return { items: items.map(record => new Draft(this.dataset, record)), totalCount };
  }
}

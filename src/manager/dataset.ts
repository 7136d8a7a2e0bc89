import { HttpClient } from '../client/httpClient';
import { DatasetResource } from '../client/resources/dataset';
import { CreateDatasetParams, DatasetRecord } from '../client/types';
import { DEFAULT_PAGE_LIMIT } from '../constants';
import { ResourceNotExistError } from '../errors';
import { info } from '../utils/logger';
import { BranchManager } from './branch';
import { CommitManager } from './commit';
import { DraftManager } from './draft';
import { LazyPagingList, Page } from './lazy';
import { TagManager } from './tag';

/**
 * A versioned dataset on the platform.
 *
 * `branch` and `commitId` describe the checked-out revision: a branch head
 * right after loading, or a detached commit after checking one out.
 */
export class Dataset {
  readonly id: string;
  readonly name: string;
  readonly alias: string;
  readonly defaultBranch: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly owner: string;
  readonly isPublic: boolean;
  readonly config: string | null;
  commitId: string | null;
  branch: string | null;

  /** @internal Client used by the dataset's managers and children. */
  readonly http: HttpClient;

  constructor(http: HttpClient, record: DatasetRecord) {
    this.http = http;
    this.id = record.id;
    this.name = record.name;
    this.alias = record.alias;
    this.defaultBranch = record.defaultBranch;
    this.commitId = record.commitId;
    this.createdAt = record.createdAt;
    this.updatedAt = record.updatedAt;
    this.owner = record.owner;
    this.isPublic = record.isPublic;
    this.config = record.config;
    this.branch = record.defaultBranch;
  }

  /** The checked-out branch name, else the checked-out commit id. */
  get revision(): string {
    return this.branch ?? this.commitId ?? this.defaultBranch;
  }

  get branches(): BranchManager {
    return new BranchManager(this);
  }

  get tags(): TagManager {
    return new TagManager(this);
  }

  get drafts(): DraftManager {
    return new DraftManager(this);
  }

  get commits(): CommitManager {
    return new CommitManager(this);
  }

  /**
   * Check out a revision. The name is looked up as a branch first; only when
   * no such branch exists is it resolved as a commit id or tag, leaving the
   * dataset detached from any branch.
   */
  async checkout(revision: string): Promise<void> {
    try {
      const branch = await this.branches.get(revision);
      this.branch = branch.name;
      this.commitId = branch.commitId;
    } catch (err) {
      if (!(err instanceof ResourceNotExistError)) throw err;
      const commit = await this.commits.get(revision);
      this.commitId = commit.commitId;
      this.branch = null;
    }
  }

  toString(): string {
    return `Dataset("${this.owner}/${this.name}")`;
  }
}

export class DatasetManager {
  private readonly resource: DatasetResource;

  constructor(private readonly http: HttpClient, readonly owner: string) {
    this.resource = new DatasetResource(http);
  }

  async create(name: string, params: CreateDatasetParams = {}): Promise<Dataset> {
    const record = await this.resource.createDataset(name, params);
    info(`Created dataset '${record.owner}/${record.name}'`);
    return new Dataset(this.http, record);
  }

  /** @throws ResourceNotExistError if the name is empty or unknown */
  async get(name: string): Promise<Dataset> {
    if (!name) {
      throw new ResourceNotExistError('dataset', name);
    }
    const record = await this.resource.getDataset(this.owner, name);
    return new Dataset(this.http, record);
  }

  list(): LazyPagingList<Dataset> {
    return new LazyPagingList((offset, limit) => this.fetchPage(offset, limit), DEFAULT_PAGE_LIMIT);
  }

  async delete(name: string): Promise<void> {
    if (!name) {
      throw new ResourceNotExistError('dataset', name);
    }
    await this.resource.deleteDataset(this.owner, name);
    info(`Deleted dataset '${this.owner}/${name}'`);
  }

  private async fetchPage(offset: number, limit: number): Promise<Page<Dataset>> {
    const { items, totalCount } = await this.resource.listDatasets({ offset, limit });
    return { items: items.map(record => new Dataset(this.http, record)), totalCount };
  }
}

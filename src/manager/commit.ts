import type { Dataset } from './dataset';
import { CommitResource } from '../client/resources/commit';
import { CommitRecord, NamedCommitRecord } from '../client/types';
import { DEFAULT_PAGE_LIMIT } from '../constants';
import { ResourceNotExistError } from '../errors';
import { LazyPagingList, Page } from './lazy';

export class Commit {
  readonly commitId: string;
  readonly parentCommitId: string | null;
  readonly title: string;
  readonly description: string;
  readonly committer: string;
  readonly committedAt: string;

  constructor(readonly dataset: Dataset, record: CommitRecord) {
    this.commitId = record.commitId;
    this.parentCommitId = record.parentCommitId;
    this.title = record.title;
    this.description = record.description;
    this.committer = record.committer;
    this.committedAt = record.committedAt;
  }

  toString(): string {
    return `${this.constructor.name}("${this.commitId}")`;
  }
}

/** A commit reached through a name: the base of branches and tags. */
export class NamedCommit extends Commit {
  readonly name: string;

  constructor(dataset: Dataset, record: NamedCommitRecord) {
    super(dataset, record);
    this.name = record.name;
  }

  toString(): string {
    return `${this.constructor.name}("${this.name}")`;
  }
}

/**
 * Read access to the history of a dataset. Commits are created by committing
 * a draft, never directly.
 */
export class CommitManager {
  private readonly resource: CommitResource;

  constructor(private readonly dataset: Dataset) {
    this.resource = new CommitResource(dataset.http, dataset.owner, dataset.name);
  }

  /**
   * @param revision - a commit id, branch name or tag name
   * @throws ResourceNotExistError if the revision is empty or unknown
   */
  async get(revision: string): Promise<Commit> {
    if (!revision) {
      throw new ResourceNotExistError('commit', revision);
    }
    const record = await this.resource.getCommit(revision);
    return new Commit(this.dataset, record);
  }

  /** Commits reachable from `revision`, defaulting to the checked-out revision. */
  list(revision?: string): LazyPagingList<Commit> {
    const target = revision ?? this.dataset.revision;
    return new LazyPagingList((offset, limit) => this.fetchPage(target, offset, limit), DEFAULT_PAGE_LIMIT);
  }

  private async fetchPage(revision: string, offset: number, limit: number): Promise<Page<Commit>> {
    const { items, totalCount } = await this.resource.listCommits({ offset, limit }, revision);
    return { items: items.map(record => new Commit(this.dataset, record)), totalCount };
  }
}

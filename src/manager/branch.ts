import type { Dataset } from './dataset';
import { BranchResource } from '../client/resources/branch';
import { DEFAULT_PAGE_LIMIT } from '../constants';
import { ResourceNotExistError } from '../errors';
import { info } from '../utils/logger';
import { NamedCommit } from './commit';
import { LazyPagingList, Page } from './lazy';

export class Branch extends NamedCommit {}

export class BranchManager {
  private readonly resource: BranchResource;

  constructor(private readonly dataset: Dataset) {
    this.resource = new BranchResource(dataset.http, dataset.owner, dataset.name);
  }

  /**
   * Create a branch pointing at `revision`, or at the checked-out revision
   * when none is given.
   */
  async create(name: string, revision?: string): Promise<Branch> {
    const record = await this.resource.createBranch(name, revision ?? this.dataset.revision);
    info(`Created branch '${name}' in dataset ${this.dataset.owner}/${this.dataset.name}`);
    return new Branch(this.dataset, record);
  }

  async get(name: string): Promise<Branch> {
    if (!name) {
      throw new ResourceNotExistError('branch', name);
    }
    const record = await this.resource.getBranch(name);
    return new Branch(this.dataset, record);
  }

  list(): LazyPagingList<Branch> {
    return new LazyPagingList((offset, limit) => this.fetchPage(offset, limit), DEFAULT_PAGE_LIMIT);
  }

  async delete(name: string): Promise<void> {
    if (!name) {
      throw new ResourceNotExistError('branch', name);
    }
    await this.resource.deleteBranch(name);
    info(`Deleted branch '${name}' from dataset ${this.dataset.owner}/${this.dataset.name}`);
  }

  private async fetchPage(offset: number, limit: number): Promise<Page<Branch>> {
    const { items, totalCount } = await this.resource.listBranches({ offset, limit });
    return { items: items.map(record => new Branch(this.dataset, record)), totalCount };
  }
}

import type { Dataset } from './dataset';
import { TagResource } from '../client/resources/tag';
import { DEFAULT_PAGE_LIMIT } from '../constants';
import { ResourceNotExistError } from '../errors';
import { info } from '../utils/logger';
import { NamedCommit } from './commit';
import { LazyPagingList, Page } from './lazy';

export class Tag extends NamedCommit {}

export class TagManager {
  private readonly resource: TagResource;

  constructor(private readonly dataset: Dataset) {
    this.resource = new TagResource(dataset.http, dataset.owner, dataset.name);
  }

  /** Tag `revision`, or the checked-out revision when none is given. */
  async create(name: string, revision?: string): Promise<Tag> {
    const record = await this.resource.createTag(name, revision ?? this.dataset.revision);
    info(`Created tag '${name}' in dataset ${this.dataset.owner}/${this.dataset.name}`);
    return new Tag(this.dataset, record);
  }

  async get(name: string): Promise<Tag> {
    if (!name) {
      throw new ResourceNotExistError('tag', name);
    }
    const record = await this.resource.getTag(name);
    return new Tag(this.dataset, record);
  }

  list(): LazyPagingList<Tag> {
    return new LazyPagingList((offset, limit) => this.fetchPage(offset, limit), DEFAULT_PAGE_LIMIT);
  }

  async delete(name: string): Promise<void> {
    if (!name) {
      throw new ResourceNotExistError('tag', name);
    }
    await this.resource.deleteTag(name);
    info(`Deleted tag '${name}' from dataset ${this.dataset.owner}/${this.dataset.name}`);
  }

  private async fetchPage(offset: number, limit: number): Promise<Page<Tag>> {
    const { items, totalCount } = await this.resource.listTags({ offset, limit });
    return { items: items.map(record => new Tag(this.dataset, record)), totalCount };
  }
}

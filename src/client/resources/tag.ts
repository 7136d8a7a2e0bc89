import { HttpClient } from '../httpClient';
import { datasetChildRoute } from '../routes';
import { decode, namedCommitRecordSchema, tagPageSchema } from '../schemas';
import { NamedCommitRecord, PageRequest } from '../types';

export class TagResource {
  constructor(private http: HttpClient, private owner: string, private dataset: string) {}

  async listTags(page: PageRequest): Promise<{ items: NamedCommitRecord[]; totalCount: number }> {
    const body = await this.http.get(datasetChildRoute(this.owner, this.dataset, 'tags'), {
      params: { offset: page.offset, limit: page.limit },
    });
    return decode(tagPageSchema, body, 'tag list');
  }

  async createTag(name: string, revision: string): Promise<NamedCommitRecord> {
    const body = await this.http.post(datasetChildRoute(this.owner, this.dataset, 'tags'), {
      json: { name, revision },
    });
    return decode(namedCommitRecordSchema, body, 'tag');
  }

  async getTag(tag: string): Promise<NamedCommitRecord> {
    const body = await this.http.get(datasetChildRoute(this.owner, this.dataset, 'tags', tag), {
      resource: { resource: 'tag', identification: tag },
    });
    return decode(namedCommitRecordSchema, body, 'tag');
  }

  async deleteTag(tag: string): Promise<void> {
    await this.http.delete(datasetChildRoute(this.owner, this.dataset, 'tags', tag), {
      resource: { resource: 'tag', identification: tag },
    });
  }
}

import { HttpClient } from '../httpClient';
import { datasetChildRoute } from '../routes';
import { commitPageSchema, commitRecordSchema, decode } from '../schemas';
import { CommitRecord, PageRequest } from '../types';

export class CommitResource {
  constructor(private http: HttpClient, private owner: string, private dataset: string) {}

  /** Commits reachable from `revision`, newest first. */
  async listCommits(
    page: PageRequest,
    revision?: string
  ): Promise<{ items: CommitRecord[]; totalCount: number }> {
    const body = await this.http.get(datasetChildRoute(this.owner, this.dataset, 'commits'), {
      params: { revision, offset: page.offset, limit: page.limit },
    });
    return decode(commitPageSchema, body, 'commit list');
  }

  async getCommit(revision: string): Promise<CommitRecord> {
    const body = await this.http.get(datasetChildRoute(this.owner, this.dataset, 'commits', revision), {
      resource: { resource: 'commit', identification: revision },
    });
    return decode(commitRecordSchema, body, 'commit');
  }

  async commitDraft(draftNumber: number, title: string, description: string): Promise<CommitRecord> {
    const body = await this.http.post(datasetChildRoute(this.owner, this.dataset, 'commits'), {
      json: { draft_number: draftNumber, title, description },
      resource: { resource: 'draft', identification: draftNumber },
    });
    return decode(commitRecordSchema, body, 'commit');
  }
}

import { DraftState } from '../../constants';
import { HttpClient } from '../httpClient';
import { datasetChildRoute } from '../routes';
import { decode, draftPageSchema, draftRecordSchema } from '../schemas';
import { CreateDraftParams, DraftRecord, EditDraftParams, ListDraftsParams, PageRequest } from '../types';

export class DraftResource {
  constructor(private http: HttpClient, private owner: string, private dataset: string) {}

  async listDrafts(
    page: PageRequest,
    filters: ListDraftsParams = {}
  ): Promise<{ items: DraftRecord[]; totalCount: number }> {
    const body = await this.http.get(datasetChildRoute(this.owner, this.dataset, 'drafts'), {
      params: {
        state: filters.state,
        branch: filters.branch,
        offset: page.offset,
        limit: page.limit,
      },
    });
    return decode(draftPageSchema, body, 'draft list');
  }

  async createDraft(title: string, params: CreateDraftParams = {}): Promise<DraftRecord> {
    const body = await this.http.post(datasetChildRoute(this.owner, this.dataset, 'drafts'), {
      json: { title, branch: params.branch, description: params.description },
    });
    return decode(draftRecordSchema, body, 'draft');
  }

  async getDraft(draftNumber: number): Promise<DraftRecord> {
    const body = await this.http.get(datasetChildRoute(this.owner, this.dataset, 'drafts', draftNumber), {
      resource: { resource: 'draft', identification: draftNumber },
    });
    return decode(draftRecordSchema, body, 'draft');
  }

  // Only the fields that are set are sent; the platform answers with the updated draft.
  async updateDraft(
    draftNumber: number,
    update: EditDraftParams & { state?: DraftState.CLOSED }
  ): Promise<DraftRecord> {
    const body = await this.http.patch(datasetChildRoute(this.owner, this.dataset, 'drafts', draftNumber), {
      json: { title: update.title, description: update.description, state: update.state },
      resource: { resource: 'draft', identification: draftNumber },
    });
    return decode(draftRecordSchema, body, 'draft');
  }
}

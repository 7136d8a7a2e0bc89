import { HttpClient } from '../httpClient';
import { datasetRoute, datasetsRoute } from '../routes';
import { datasetPageSchema, datasetRecordSchema, decode } from '../schemas';
import { CreateDatasetParams, DatasetRecord, PageRequest } from '../types';

// The request names the dataset, so those fields are taken from it rather than the body.
function withIdentity(body: unknown, identity: { owner?: string; name: string }): unknown {
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body, ...identity } : body;
}

export class DatasetResource {
  constructor(private http: HttpClient) {}

  async listDatasets(page: PageRequest): Promise<{ items: DatasetRecord[]; totalCount: number }> {
    const body = await this.http.get(datasetsRoute(), {
      params: { offset: page.offset, limit: page.limit },
    });
    return decode(datasetPageSchema, body, 'dataset list');
  }

  async createDataset(name: string, params: CreateDatasetParams = {}): Promise<DatasetRecord> {
    const body = await this.http.post(datasetsRoute(), {
      json: {
        name,
        alias: params.alias ?? '',
        is_public: params.isPublic ?? false,
        config: params.config ?? null,
      },
    });
    return decode(datasetRecordSchema, withIdentity(body, { name }), 'dataset');
  }

  async getDataset(owner: string, dataset: string): Promise<DatasetRecord> {
    const body = await this.http.get(datasetRoute(owner, dataset), {
      resource: { resource: 'dataset', identification: dataset },
    });
    return decode(datasetRecordSchema, withIdentity(body, { owner, name: dataset }), 'dataset');
  }

  async deleteDataset(owner: string, dataset: string): Promise<void> {
    await this.http.delete(datasetRoute(owner, dataset), {
      resource: { resource: 'dataset', identification: dataset },
    });
  }
}

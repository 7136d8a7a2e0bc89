import { HttpClient } from '../httpClient';
import { datasetChildRoute } from '../routes';
import { branchPageSchema, decode, namedCommitRecordSchema } from '../schemas';
import { NamedCommitRecord, PageRequest } from '../types';

export class BranchResource {
  constructor(private http: HttpClient, private owner: string, private dataset: string) {}

  async listBranches(page: PageRequest): Promise<{ items: NamedCommitRecord[]; totalCount: number }> {
    const body = await this.http.get(datasetChildRoute(this.owner, this.dataset, 'branches'), {
      params: { offset: page.offset, limit: page.limit },
    });
    return decode(branchPageSchema, body, 'branch list');
  }

  async createBranch(name: string, revision: string): Promise<NamedCommitRecord> {
    const body = await this.http.post(datasetChildRoute(this.owner, this.dataset, 'branches'), {
      json: { name, revision },
    });
    return decode(namedCommitRecordSchema, body, 'branch');
  }

  async getBranch(branch: string): Promise<NamedCommitRecord> {
    const body = await this.http.get(datasetChildRoute(this.owner, this.dataset, 'branches', branch), {
      resource: { resource: 'branch', identification: branch },
    });
    return decode(namedCommitRecordSchema, body, 'branch');
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.http.delete(datasetChildRoute(this.owner, this.dataset, 'branches', branch), {
      resource: { resource: 'branch', identification: branch },
    });
  }
}

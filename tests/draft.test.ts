import { DraftState } from '../src/constants';
import { Draft } from '../src/manager/draft';
import { ListDraftsParams } from '../src/client/types';
import { ResourceNotExistError, ValidationError } from '../src/errors';
import { commitJson, draftJson, jsonBody } from './helpers/fakeApi';
import { loadDataset } from './helpers/platform';

const DRAFTS = '/v2/datasets/alice/mnist/drafts';

describe('DraftManager', () => {
  it('creates a draft on the checked-out branch', async () => {
    const { api, dataset } = await loadDataset();
    api.on('POST', DRAFTS, request => {
      const body = jsonBody(request);
      return { status: 201, body: draftJson(1, { title: body.title, branch: body.branch }) };
    });

    const draft = await dataset.drafts.create('fix labels');
    expect(draft).toBeInstanceOf(Draft);
    expect(draft).toMatchObject({ number: 1, title: 'fix labels', branch: 'main', state: DraftState.OPEN });
    expect(draft.dataset).toBe(dataset);
    expect(api.requests[0].body).toEqual({ title: 'fix labels', branch: 'main' });

    await dataset.drafts.create('relabel', { branch: 'dev', description: 'second pass' });
    expect(api.requests[1].body).toEqual({ title: 'relabel', branch: 'dev', description: 'second pass' });
  });

  it('lists drafts with the filters given at list time', async () => {
    const { api, dataset } = await loadDataset();
    api.collection(DRAFTS, 'drafts', [draftJson(1, { state: 'CLOSED' }), draftJson(2, { state: 'CLOSED' })]);

    const filters: ListDraftsParams = { state: DraftState.CLOSED, branch: 'dev' };
    const drafts = dataset.drafts.list(filters);
    filters.branch = 'other';

    expect((await drafts.toArray()).map(d => d.number)).toEqual([1, 2]);
    expect(api.requests[0].params).toEqual({ state: 'CLOSED', branch: 'dev', offset: 0, limit: 128 });
  });

  it('lists open drafts of every branch by default', async () => {
    const { api, dataset } = await loadDataset();
    api.collection(DRAFTS, 'drafts', []);

    await expect(dataset.drafts.list().length()).resolves.toBe(0);
    expect(api.requests[0].params).toEqual({ offset: 0, limit: 128 });
  });

  it('gets a draft by number', async () => {
    const { api, dataset } = await loadDataset();
    api.on('GET', `${DRAFTS}/3`, { status: 200, body: draftJson(3, { description: 'notes' }) });

    const draft = await dataset.drafts.get(3);
    expect(draft).toMatchObject({ number: 3, description: 'notes', parentCommitId: 'c1', creator: 'alice' });
    expect(String(draft)).toBe('Draft("#3: draft 3")');
  });

  it('rejects invalid draft numbers without a request', async () => {
    const { api, dataset } = await loadDataset();

    await expect(dataset.drafts.get(0)).rejects.toThrow(ResourceNotExistError);
    await expect(dataset.drafts.get(1.5)).rejects.toThrow(ResourceNotExistError);
    expect(api.requests).toHaveLength(0);

    await expect(dataset.drafts.get(9)).rejects.toThrow('The draft "9" does not exist');
  });
});

describe('Draft', () => {
  async function openDraft() {
    const { api, dataset } = await loadDataset();
    api.on('GET', `${DRAFTS}/1`, { status: 200, body: draftJson(1) });
    const draft = await dataset.drafts.get(1);
    api.requests.length = 0;
    return { api, dataset, draft };
  }

  it('edits only the given fields', async () => {
    const { api, draft } = await openDraft();
    api.on('PATCH', `${DRAFTS}/1`, {
      status: 200,
      body: draftJson(1, { title: 'renamed', updated_at: '2024-03-05T00:00:00Z' }),
    });

    await draft.edit({ title: 'renamed' });
    expect(api.requests[0].body).toEqual({ title: 'renamed' });
    expect(draft).toMatchObject({ title: 'renamed', description: '', updatedAt: '2024-03-05T00:00:00Z' });
  });

  it('does not update other copies of the same draft', async () => {
    const { api, dataset, draft } = await openDraft();
    api.on('PATCH', `${DRAFTS}/1`, { status: 200, body: draftJson(1, { description: 'more' }) });
    const copy = await dataset.drafts.get(1);

    await draft.edit({ description: 'more' });
    expect(draft.description).toBe('more');
    expect(copy.description).toBe('');
  });

  it('keeps local fields when an edit is rejected', async () => {
    const { api, draft } = await openDraft();
    api.on('PATCH', `${DRAFTS}/1`, { status: 422, body: { message: 'title too long' } });

    await expect(draft.edit({ title: 'x'.repeat(300) })).rejects.toThrow(ValidationError);
    expect(draft.title).toBe('draft 1');
  });

  it('closes a draft', async () => {
    const { api, draft } = await openDraft();
    api.on('PATCH', `${DRAFTS}/1`, { status: 200, body: draftJson(1, { state: 'CLOSED' }) });

    await draft.close();
    expect(api.requests[0].body).toEqual({ state: 'CLOSED' });
    expect(draft.state).toBe(DraftState.CLOSED);
  });

  it('commits a draft', async () => {
    const { api, draft } = await openDraft();
    api.on('POST', '/v2/datasets/alice/mnist/commits', { status: 201, body: commitJson('c2', { parent_commit_id: 'c1' }) });

    await draft.commit('first labels');
    expect(api.requests[0].body).toEqual({ draft_number: 1, title: 'first labels', description: '' });
    expect(draft.state).toBe(DraftState.COMMITTED);
  });
});

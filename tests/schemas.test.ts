import { datasetRecordSchema, decode, draftPageSchema, draftRecordSchema } from '../src/client/schemas';
import { DraftState } from '../src/constants';
import { ResponseFormatError } from '../src/errors';
import { draftJson } from './helpers/fakeApi';

describe('decode', () => {
  it('maps snake_case fields and fills optional ones', () => {
    const required = {
      id: 'id-mnist',
      name: 'mnist',
      default_branch: 'main',
      created_at: '2024-03-01T00:00:00Z',
      updated_at: '2024-03-02T00:00:00Z',
      owner: 'alice',
    };

    expect(decode(datasetRecordSchema, required, 'dataset')).toEqual({
      id: 'id-mnist',
      name: 'mnist',
      alias: '',
      defaultBranch: 'main',
      commitId: null,
      createdAt: '2024-03-01T00:00:00Z',
      updatedAt: '2024-03-02T00:00:00Z',
      owner: 'alice',
      isPublic: false,
      config: null,
    });
  });

  it('turns a page envelope into items and a total', () => {
    const page = decode(
      draftPageSchema,
      { drafts: [draftJson(4)], offset: 0, record_size: 1, total_count: 9 },
      'draft list'
    );

    expect(page.totalCount).toBe(9);
    expect(page.items).toHaveLength(1);
    expect(page.items[0]).toMatchObject({ number: 4, state: DraftState.OPEN, parentCommitId: 'c1' });
  });

  it('names the offending field', () => {
    const parse = () => decode(draftRecordSchema, draftJson(1, { state: 'DONE' }), 'draft');

    expect(parse).toThrow(ResponseFormatError);
    expect(parse).toThrow(/^Unexpected draft response at state: /);
  });

  it('rejects a negative total', () => {
    expect(() => decode(draftPageSchema, { drafts: [], total_count: -1 }, 'draft list')).toThrow(
      /^Unexpected draft list response at total_count: /
    );
  });

  it('rejects a body that is not an object', () => {
    expect(() => decode(datasetRecordSchema, 'oops', 'dataset')).toThrow(
      /^Unexpected dataset response at <root>: /
    );
  });
});

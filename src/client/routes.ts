const segment = (value: string | number) => encodeURIComponent(String(value));

export const datasetsRoute = () => 'v2/datasets';

export const datasetRoute = (owner: string, dataset: string) =>
  `${datasetsRoute()}/${segment(owner)}/${segment(dataset)}`;

export const datasetChildRoute = (
  owner: string,
  dataset: string,
  collection: 'branches' | 'tags' | 'commits' | 'drafts',
  id?: string | number
) => {
  const base = `${datasetRoute(owner, dataset)}/${collection}`;
  return id === undefined ? base : `${base}/${segment(id)}`;
};

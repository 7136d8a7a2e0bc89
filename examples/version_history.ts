import { Dataset, DraftState, Platform, ResourceNotExistError } from '../src';

// Reads STRATA_ACCESS_KEY, STRATA_OWNER and optionally STRATA_URL from the environment.
async function main() {
  const platform = new Platform();
  const datasetName = process.argv[2] ?? 'mnist';

  const datasets = platform.datasets.list();
  console.log(`${await datasets.length()} dataset(s) visible; the first five:`);
  for await (const dataset of datasets.slice(0, 5)) {
    console.log(`  ${dataset} on ${dataset.defaultBranch}`);
  }

  let dataset: Dataset;
  try {
    dataset = await platform.datasets.get(datasetName);
  } catch (err) {
    if (err instanceof ResourceNotExistError) {
      dataset = await platform.datasets.create(datasetName, { alias: datasetName.toUpperCase() });
    } else {
      throw err;
    }
  }

  console.log('\nBranches:');
  for await (const branch of dataset.branches.list()) {
    console.log(`  ${branch.name} -> ${branch.commitId}`);
  }

  console.log('\nLatest three commits:');
  for await (const commit of dataset.commits.list().slice(0, 3)) {
    console.log(`  ${commit.commitId} ${commit.title} (${commit.committer})`);
  }

  const draft = await dataset.drafts.create('Relabel a batch of samples', {
    description: 'Created by the version history example',
  });
  await draft.edit({ title: 'Relabel samples' });
  console.log(`\nOpened ${draft}`);

  const open = await dataset.drafts.list({ state: DraftState.OPEN }).toArray();
  console.log(`${open.length} open draft(s)`);

  await draft.close();
  console.log(`Closed ${draft}`);
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});

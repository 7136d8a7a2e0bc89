import { HttpClient } from './client/httpClient';
import { resolveConfig } from './config';
import { DatasetManager } from './manager/dataset';
import { PlatformParams, StrataConfig } from './types';
import { info } from './utils/logger';

/**
 * Entry point of the SDK.
 *
 * @example
 * const platform = new Platform({ accessKey: 'test-key', owner: 'alice' });
 * for await (const dataset of platform.datasets.list()) {
 *   console.log(String(dataset));
 * }
 */
export class Platform {
  readonly config: Readonly<StrataConfig>;
  readonly datasets: DatasetManager;

  constructor(params: PlatformParams = {}) {
    this.config = resolveConfig(params);
    this.datasets = new DatasetManager(new HttpClient(this.config), this.config.owner);
    info(`Connected to ${this.config.url} as ${this.config.owner}`);
  }
}

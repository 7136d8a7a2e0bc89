export interface StrataConfig {
  accessKey: string;
  url: string;
  owner: string;
  timeout: number;
  maxRetries: number;
  retryDelay: number;
}

export type PlatformParams = Partial<StrataConfig>;

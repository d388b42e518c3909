interface BaseCommandOptions {
  config?: string;
  projectRoot?: string;
}

export interface CheckOptions extends BaseCommandOptions {
  format?: "human" | "json";
  baseline?: string;
  failOnWarnings?: boolean;
  verbose?: boolean;
}

export interface BaselineOptions extends BaseCommandOptions {
  baseline?: string;
}

export interface ScaffoldOptions extends BaseCommandOptions {
  dryRun?: boolean;
  yes?: boolean;
}

export type WatchOptions = BaseCommandOptions;

export interface InitOptions {
  yes?: boolean;
}

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export interface Config {
  data: {
    dir?: string; // FTL data folder; the CLI argument wins
    entryPointsPath: string;
    vocabularyPath: string;
  };

  output: {
    path: string;
    title: string;
    strict: boolean; // any diagnostic => non-zero exit
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}

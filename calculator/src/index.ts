export * from "./core/dto";
export * from "./core/finance";
export * from "./core/heuristics";
export * from "./core/analyze";
export * from "./core/format";
export * from "./core/report";
export * from "./core/ports";
export * from "./core/schemas";
export * from "./core/session";
export { MemoryConfigurationRepo } from "./adapters/repo.memory";
export { SqlConfigurationRepo } from "./adapters/repo.sql";
export type { Queryable } from "./adapters/repo.sql";
export { JsPdfReportRenderer } from "./adapters/report.pdf";
export { DEFAULT_SAMPLES_PATH, FileSampleSource } from "./adapters/samples.file";
export { createApp } from "./http/app";
export type { AppOptions } from "./http/app";
export { SESSION_HEADER } from "./http/routes";
export type { RouteDependencies } from "./http/routes";

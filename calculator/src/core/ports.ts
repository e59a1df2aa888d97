import type {
  SampleDeal,
  SavedConfiguration,
  SavedConfigurationDraft,
} from "./dto";
import type { DealReport } from "./report";

// Persistence for named input sets
export interface ConfigurationRepoPort {
  save(draft: SavedConfigurationDraft): Promise<SavedConfiguration>;
  getById(id: string): Promise<SavedConfiguration | null>;
  list(): Promise<SavedConfiguration[]>;
  delete(id: string): Promise<boolean>;
}

// Document export (PDF or anything else that turns a report into bytes)
export interface ReportRendererPort {
  render(report: DealReport): Promise<Uint8Array>;
}

// Bundled example deals
export interface SampleSourcePort {
  list(): Promise<SampleDeal[]>;
  get(id: string): Promise<SampleDeal | null>;
}

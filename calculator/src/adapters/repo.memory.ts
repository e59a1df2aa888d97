import * as crypto from "crypto";
import type {
  SavedConfiguration,
  SavedConfigurationDraft,
} from "../core/dto";
import type { ConfigurationRepoPort } from "../core/ports";

function copyOf(configuration: SavedConfiguration): SavedConfiguration {
  return {
    ...configuration,
    financing: { ...configuration.financing },
    operations: { ...configuration.operations },
  };
}

/**
 * In-memory implementation of the configuration repository
 * Default runtime store and test double.
 */
export class MemoryConfigurationRepo implements ConfigurationRepoPort {
  private configurations = new Map<string, SavedConfiguration>();

  constructor(
    private newId: () => string = () => crypto.randomUUID(),
    private clock: () => Date = () => new Date()
  ) {}

  async save(draft: SavedConfigurationDraft): Promise<SavedConfiguration> {
    const saved: SavedConfiguration = {
      ...draft,
      financing: { ...draft.financing },
      operations: { ...draft.operations },
      id: this.newId(),
      createdAt: this.clock().toISOString(),
    };
    this.configurations.set(saved.id, saved);
    return copyOf(saved);
  }

  async getById(id: string): Promise<SavedConfiguration | null> {
    const found = this.configurations.get(id);
    return found ? copyOf(found) : null;
  }

  async list(): Promise<SavedConfiguration[]> {
    return Array.from(this.configurations.values())
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map(copyOf);
  }

  async delete(id: string): Promise<boolean> {
    return this.configurations.delete(id);
  }

  // Test helper methods
  count(): number {
    return this.configurations.size;
  }

  clear(): void {
    this.configurations.clear();
  }
}

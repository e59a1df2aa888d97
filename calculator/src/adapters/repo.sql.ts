import type { QueryResult } from "pg";
import { z } from "zod";
import type {
  SavedConfiguration,
  SavedConfigurationDraft,
} from "../core/dto";
import type { ConfigurationRepoPort } from "../core/ports";
import {
  calculationModelSchema,
  financingSchema,
  operationsSchema,
} from "../core/schemas";

/** The slice of pg's Pool the repository uses */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

const configurationRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  model: calculationModelSchema,
  financing: financingSchema,
  operations: operationsSchema,
  created_at: z.date(),
});

/**
 * PostgreSQL implementation of the configuration repository
 * Inputs are stored as JSONB and re-validated on the way out.
 */
export class SqlConfigurationRepo implements ConfigurationRepoPort {
  constructor(private pool: Queryable) {}

  async save(draft: SavedConfigurationDraft): Promise<SavedConfiguration> {
    const result = await this.pool.query(
      `
        INSERT INTO saved_configurations (name, model, financing, operations)
        VALUES ($1, $2, $3, $4)
        RETURNING id, name, model, financing, operations, created_at
      `,
      [
        draft.name,
        draft.model,
        JSON.stringify(draft.financing),
        JSON.stringify(draft.operations),
      ]
    );

    return this.mapRow(result.rows[0]);
  }

  async getById(id: string): Promise<SavedConfiguration | null> {
    const result = await this.pool.query(
      `
        SELECT id, name, model, financing, operations, created_at
        FROM saved_configurations
        WHERE id = $1
      `,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return this.mapRow(result.rows[0]);
  }

  async list(): Promise<SavedConfiguration[]> {
    const result = await this.pool.query(
      `
        SELECT id, name, model, financing, operations, created_at
        FROM saved_configurations
        ORDER BY created_at ASC
      `
    );

    return result.rows.map((row) => this.mapRow(row));
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query(
      "DELETE FROM saved_configurations WHERE id = $1",
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  private mapRow(row: unknown): SavedConfiguration {
    const parsed = configurationRowSchema.parse(row);
    return {
      id: parsed.id,
      name: parsed.name,
      model: parsed.model,
      financing: parsed.financing,
      operations: parsed.operations,
      createdAt: parsed.created_at.toISOString(),
    };
  }
}

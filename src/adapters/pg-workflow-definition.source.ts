import { Logger } from '@nestjs/common';
import type { Pool } from 'pg';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import type { IWorkflowDefinitionSource } from '../interfaces/workflow-definition-source.interface';
import { assertTableName } from '../utils/assert-table-name';
import { validateWorkflowDefinition } from '../utils/validate-workflow-definition';
import { isPlainObject } from '../utils/resolve-path';

interface PgDefinitionRow {
  id: string;
  name: string;
  is_active: boolean;
  definition: unknown;
}

/**
 * Reads definitions from the `workflow_definitions` table the intake API
 * writes: `definition` holds the trigger and step graph as JSON.
 * `listActive` skips rows that do not parse or validate, with a warning.
 */
export class PgWorkflowDefinitionSource implements IWorkflowDefinitionSource {
  private readonly logger = new Logger(PgWorkflowDefinitionSource.name);

  constructor(
    private readonly pool: Pick<Pool, 'query'>,
    private readonly actionTypes: () => Iterable<string>,
    private readonly tableName: string = 'workflow_definitions',
  ) {
    assertTableName(tableName);
  }

  async listActive(): Promise<WorkflowDefinition[]> {
    const result = await this.pool.query<PgDefinitionRow>(
      `SELECT id, name, is_active, definition
       FROM ${this.tableName}
       WHERE is_active = TRUE
       ORDER BY created_at, id`,
    );

    const definitions: WorkflowDefinition[] = [];
    for (const row of result.rows) {
      try {
        definitions.push(this.toDefinition(row));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Skipping workflow definition ${row.id}: ${message}`);
      }
    }
    return definitions;
  }

  async findById(id: string): Promise<WorkflowDefinition | null> {
    const result = await this.pool.query<PgDefinitionRow>(
      `SELECT id, name, is_active, definition
       FROM ${this.tableName}
       WHERE id = $1`,
      [id],
    );
    if (result.rows.length === 0) return null;
    return this.toDefinition(result.rows[0]);
  }

  private toDefinition(row: PgDefinitionRow): WorkflowDefinition {
    const body: unknown =
      typeof row.definition === 'string'
        ? JSON.parse(row.definition)
        : row.definition;

    return validateWorkflowDefinition(
      {
        ...(isPlainObject(body) ? body : {}),
        id: row.id,
        name: row.name,
        active: row.is_active,
      },
      this.actionTypes(),
    );
  }
}

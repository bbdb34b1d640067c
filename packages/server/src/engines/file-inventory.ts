import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { errorMessage, ExternalFunctionError } from '../pipeline/errors.js';
import type { InventorySnapshot, InventorySource } from './types.js';

const inventorySchema = z.record(z.number().int().min(0));

/**
 * Inventory read from a JSON object of `{ "<resource>": <quantity> }`.
 * The file is re-read on every snapshot so edits apply to the next plan.
 */
export class FileInventorySource implements InventorySource {
  constructor(private readonly filePath: string) {}

  async snapshot(): Promise<InventorySnapshot> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new ExternalFunctionError(`Cannot read inventory ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ExternalFunctionError(`Inventory ${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = inventorySchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalFunctionError(`Invalid inventory ${this.filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

/**
 * Fixed inventory, for tests and embedding.
 */
export class StaticInventorySource implements InventorySource {
  constructor(private readonly inventory: InventorySnapshot) {}

  snapshot(): Promise<InventorySnapshot> {
    return Promise.resolve({ ...this.inventory });
  }
}

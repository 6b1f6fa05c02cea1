import { logger } from '../../utils/logger';
import type { DocumentStore } from '../../models/Document';
import type { CustomFieldInstance, Document } from '@retitler/shared/schemas/paperless.zod';

export type Clock = () => Date;

export function customFieldValues(document: Document): Map<number, unknown> {
  return new Map(document.custom_fields.map((instance) => [instance.field, instance.value]));
}

function hasValue(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === 0 || value === '') {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
}

function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Tracks which documents were already processed through a numeric custom
 * field holding the processing timestamp.
 */
export class ProcessedFieldTracker {
  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Resolves the marker field: by `preferredId` first, then by `name`,
   * creating it when neither exists. The returned id is the one to use for
   * the rest of the run; `null` when the field could not be created.
   */
  async ensureField(name: string, preferredId: number): Promise<number | null> {
    const fields = await this.store.listCustomFields();
    if (!fields || fields.length === 0) {
      return this.store.createCustomField(name);
    }

    const byId = fields.find((field) => field.id === preferredId);
    if (byId) {
      logger.debug(`Found existing custom field ${name} with ID ${preferredId}`);
      return byId.id;
    }

    const byName = fields.find((field) => field.name === name);
    if (byName) {
      logger.debug(`Found existing custom field ${name} with ID ${byName.id}`);
      return byName.id;
    }

    return this.store.createCustomField(name);
  }

  isProcessed(document: Document, fieldId: number): boolean {
    const values = customFieldValues(document);
    return values.has(fieldId) && hasValue(values.get(fieldId));
  }

  /**
   * Re-reads the document so concurrent edits to its other custom fields are
   * kept, then writes the current timestamp into the marker field only.
   */
  async markProcessed(documentId: number, fieldId: number): Promise<boolean> {
    const document = await this.store.getDocument(documentId);
    if (!document) {
      logger.error(`Could not retrieve document info for document ${documentId}`);
      return false;
    }

    const timestamp = unixSeconds(this.clock());
    const updated: CustomFieldInstance[] = document.custom_fields.map((instance) =>
      instance.field === fieldId ? { field: fieldId, value: timestamp } : instance
    );

    if (!document.custom_fields.some((instance) => instance.field === fieldId)) {
      updated.push({ field: fieldId, value: timestamp });
    }

    const ok = await this.store.patchCustomFields(documentId, updated);
    if (!ok) {
      logger.error(`Could not update processed status for document ${documentId}`);
      return false;
    }

    logger.info(`Updated processed status for document ${documentId} with timestamp ${timestamp}`);
    return true;
  }
}

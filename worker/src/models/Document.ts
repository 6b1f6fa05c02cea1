import type {
  CustomField,
  CustomFieldInstance,
  Document,
} from '@retitler/shared/schemas/paperless.zod';

export interface SimilarDocument {
  id: number;
  title: string;
  score: number;
}

/**
 * Operations the pipeline needs from the document store. Reads resolve to
 * `null` (or an empty list) when the store could not be reached; writes
 * resolve to `false`. None of them throw for remote failures.
 */
export interface DocumentStore {
  listDocuments(filter?: string): Promise<Document[]>;
  getDocument(id: number): Promise<Document | null>;
  downloadDocument(id: number, directory: string): Promise<string | null>;
  patchTitle(id: number, title: string): Promise<boolean>;
  patchContent(id: number, content: string): Promise<boolean>;
  patchCustomFields(id: number, fields: CustomFieldInstance[]): Promise<boolean>;
  findSimilar(id: number, limit?: number): Promise<SimilarDocument[]>;
  listCustomFields(): Promise<CustomField[] | null>;
  createCustomField(name: string): Promise<number | null>;
}

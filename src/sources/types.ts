/**
 * Where a document can be fetched from
 */
export type WorkItemLocation =
  | { kind: 'local'; path: string }
  | { kind: 'blob'; container: string; blobName: string; url: string };

/**
 * One document to process. Created by a task source, consumed exactly once.
 */
export interface WorkItem {
  /** Display name: file name for local documents, full blob name for blobs */
  readonly name: string;
  /** Lower-cased extension including the dot (".pdf") */
  readonly extension: string;
  readonly location: WorkItemLocation;
}

/**
 * Enumerates the documents of one batch.
 * Rejects with EnumerationError when the location cannot be listed.
 */
export interface TaskSource {
  readonly description: string;
  list(): Promise<WorkItem[]>;
}

export function normalizeExtensions(extensions: readonly string[]): Set<string> {
  return new Set(
    extensions.map((ext) => {
      const lower = ext.trim().toLowerCase();
      return lower.startsWith('.') ? lower : `.${lower}`;
    })
  );
}

export function byName(a: WorkItem, b: WorkItem): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

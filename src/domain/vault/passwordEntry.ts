/**
 * Stored credentials for one site or service.
 */
export interface PasswordEntry {
  readonly id: string;
  readonly ownerId: string;
  readonly folderId: string | null;
  readonly name: string;
  readonly username: string | null;
  readonly secret: string | null;
  readonly url: string | null;
  readonly notes: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Columns a caller may set on an entry. */
export type EntryField = 'name' | 'username' | 'secret' | 'url' | 'notes' | 'folderId';

/**
 * Partial update of an entry.
 * A key that is absent (or undefined) leaves the column untouched,
 * null clears it, and a value overwrites it. The name can't be cleared.
 */
export interface PasswordEntryPatch {
  readonly name?: string;
  readonly username?: string | null;
  readonly secret?: string | null;
  readonly url?: string | null;
  readonly notes?: string | null;
  readonly folderId?: string | null;
}

/**
 * Folder filter for listing entries: a folder id, or null for entries outside any folder.
 */
export interface EntryListFilter {
  readonly folderId?: string | null;
}

export const ENTRY_FIELDS: readonly EntryField[] = [
  'name',
  'username',
  'secret',
  'url',
  'notes',
  'folderId',
];

/**
 * The fields a patch actually supplies, in column order.
 */
export function suppliedFields(patch: PasswordEntryPatch): EntryField[] {
  return ENTRY_FIELDS.filter((field) => patch[field] !== undefined);
}

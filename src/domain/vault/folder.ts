/**
 * Named grouping of password entries, scoped to a single owner.
 * Deleting a folder leaves its entries in place with no folder.
 */
export interface Folder {
  readonly id: string;
  readonly ownerId: string;
  readonly name: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

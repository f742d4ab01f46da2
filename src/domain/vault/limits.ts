/**
 * Field length bounds shared by the request contracts and the SQL schema.
 */
export const LIMITS = {
  usernameMin: 3,
  usernameMax: 50,
  credentialMin: 6,
  folderNameMax: 100,
  entryNameMax: 100,
  entryUsernameMax: 100,
  entryUrlMax: 500,
} as const;

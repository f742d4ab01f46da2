/**
 * Vault account. Owns folders and password entries; deleting it removes both.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly credentialHash: string;
  readonly createdAt: Date;
}

import { z } from 'zod';
import { LIMITS } from '../../domain/vault/limits.js';

/**
 * Request contracts for the vault. Everything reaching a service has passed one of these.
 * Optional text fields treat '' as "no value" and store null.
 */

/** Length in characters (code points), the way VARCHAR(n) counts. */
export function charLength(value: string): number {
  return [...value].length;
}

function text(min: number, max?: number) {
  return z.string().superRefine((value, ctx) => {
    const length = charLength(value);
    if (length < min) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_small,
        minimum: min,
        inclusive: true,
        type: 'string',
        message: `String must contain at least ${min} character(s)`,
      });
    }
    if (max !== undefined && length > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: max,
        inclusive: true,
        type: 'string',
        message: `String must contain at most ${max} character(s)`,
      });
    }
  });
}

function optionalText(max?: number) {
  return text(0, max)
    .nullable()
    .optional()
    .transform((value) => (value === '' ? null : value));
}

const vaultId = z.string().uuid();

/**
 * Whether a value can name a stored user, folder or entry. Anything else names nothing.
 */
export function isVaultId(value: string): boolean {
  return vaultId.safeParse(value).success;
}

const optionalFolderId = z
  .union([z.literal(''), vaultId])
  .nullable()
  .optional()
  .transform((value) => (value === '' ? null : value));

export const idParamsSchema = z.object({
  id: vaultId,
});

export const userCreateSchema = z.object({
  username: text(LIMITS.usernameMin, LIMITS.usernameMax),
  rawCredential: text(LIMITS.credentialMin),
});

export const folderCreateSchema = z.object({
  name: text(1, LIMITS.folderNameMax),
});

export const folderUpdateSchema = folderCreateSchema;

export const entryCreateSchema = z.object({
  name: text(1, LIMITS.entryNameMax),
  username: optionalText(LIMITS.entryUsernameMax),
  secret: optionalText(),
  url: optionalText(LIMITS.entryUrlMax),
  notes: optionalText(),
  folderId: optionalFolderId,
});

export const entryUpdateSchema = z.object({
  name: text(1, LIMITS.entryNameMax).optional(),
  username: optionalText(LIMITS.entryUsernameMax),
  secret: optionalText(),
  url: optionalText(LIMITS.entryUrlMax),
  notes: optionalText(),
  folderId: optionalFolderId,
});

// ?folderId=<uuid> narrows to one folder, ?folderId=none to entries outside any folder
export const entryListQuerySchema = z.object({
  folderId: z.union([z.literal('none'), vaultId]).optional(),
});

export type UserCreate = z.infer<typeof userCreateSchema>;
export type FolderCreate = z.infer<typeof folderCreateSchema>;
export type FolderUpdate = z.infer<typeof folderUpdateSchema>;
export type PasswordEntryCreate = z.infer<typeof entryCreateSchema>;
export type PasswordEntryUpdate = z.infer<typeof entryUpdateSchema>;

import { Router } from 'express';
import { NotFoundError } from '../../../application/errors.js';
import {
  entryCreateSchema,
  entryListQuerySchema,
  entryUpdateSchema,
  idParamsSchema,
} from '../../../application/vault/contracts.js';
import type { PasswordEntryService } from '../../../application/vault/passwordEntryService.js';
import { toEntryResponse, toEntryWithSecretResponse } from '../../../application/vault/responses.js';
import type { EntryListFilter } from '../../../domain/vault/passwordEntry.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requireOwner } from '../middleware/identity.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /api/entries:
 *   get:
 *     tags: [Entries]
 *     summary: List password entries (secrets withheld)
 *     parameters:
 *       - in: query
 *         name: folderId
 *         required: false
 *         description: A folder id, or "none" for entries outside any folder
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/PasswordEntryResponse' }
 *   post:
 *     tags: [Entries]
 *     summary: Create a password entry
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/PasswordEntryInput' }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/PasswordEntryResponse' }
 *       400:
 *         description: Validation error or unknown folder
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/entries/{id}:
 *   get:
 *     tags: [Entries]
 *     summary: Get a password entry (secret withheld)
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/PasswordEntryResponse' }
 *       404:
 *         description: Entry not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Entries]
 *     summary: Update the supplied fields of an entry; null clears a field
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/PasswordEntryInput' }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/PasswordEntryResponse' }
 *       400:
 *         description: Validation error or unknown folder
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Entry not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Entries]
 *     summary: Delete a password entry
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       204: { description: Deleted }
 *       404:
 *         description: Entry not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/entries/{id}/secret:
 *   get:
 *     tags: [Entries]
 *     summary: Get a password entry including its secret
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Entry not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export function createEntryRoutes(entries: PasswordEntryService) {
  const router = Router();

  router.get(
    '/',
    validate({ query: entryListQuerySchema }),
    asyncHandler(async (req, res) => {
      const query = entryListQuerySchema.parse(req.query);
      const filter: EntryListFilter =
        query.folderId === undefined
          ? {}
          : { folderId: query.folderId === 'none' ? null : query.folderId };

      const list = await entries.listEntries(requireOwner(req), filter);
      res.json(list.map(toEntryResponse));
    })
  );

  router.post(
    '/',
    validate({ body: entryCreateSchema }),
    asyncHandler(async (req, res) => {
      const body = entryCreateSchema.parse(req.body);
      const entry = await entries.createEntry(requireOwner(req), body);
      res.status(201).json(toEntryResponse(entry));
    })
  );

  router.get(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const entry = await entries.getEntry(id, requireOwner(req));
      if (!entry) {
        throw new NotFoundError('Entry not found');
      }
      res.json(toEntryResponse(entry));
    })
  );

  router.get(
    '/:id/secret',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const entry = await entries.getEntry(id, requireOwner(req));
      if (!entry) {
        throw new NotFoundError('Entry not found');
      }
      res.setHeader('Cache-Control', 'no-store');
      res.json(toEntryWithSecretResponse(entry));
    })
  );

  router.patch(
    '/:id',
    validate({ params: idParamsSchema, body: entryUpdateSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const patch = entryUpdateSchema.parse(req.body);

      const entry = await entries.updateEntry(id, requireOwner(req), patch);
      if (!entry) {
        throw new NotFoundError('Entry not found');
      }
      res.json(toEntryResponse(entry));
    })
  );

  router.delete(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const deleted = await entries.deleteEntry(id, requireOwner(req));
      if (!deleted) {
        throw new NotFoundError('Entry not found');
      }
      res.status(204).end();
    })
  );

  return router;
}

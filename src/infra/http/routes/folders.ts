import { Router } from 'express';
import { NotFoundError } from '../../../application/errors.js';
import {
  folderCreateSchema,
  folderUpdateSchema,
  idParamsSchema,
} from '../../../application/vault/contracts.js';
import type { FolderService } from '../../../application/vault/folderService.js';
import type { PasswordEntryService } from '../../../application/vault/passwordEntryService.js';
import { toEntryResponse, toFolderResponse } from '../../../application/vault/responses.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requireOwner } from '../middleware/identity.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /api/folders:
 *   get:
 *     tags: [Folders]
 *     summary: List folders
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/FolderResponse' }
 *   post:
 *     tags: [Folders]
 *     summary: Create a folder
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name]
 *             properties:
 *               name: { type: string, minLength: 1, maxLength: 100, example: Work }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/FolderResponse' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/folders/{id}:
 *   get:
 *     tags: [Folders]
 *     summary: Folder with its entries
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Folder not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Folders]
 *     summary: Rename a folder
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name]
 *             properties:
 *               name: { type: string, minLength: 1, maxLength: 100 }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/FolderResponse' }
 *       404:
 *         description: Folder not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Folders]
 *     summary: Delete a folder; its entries are kept without a folder
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       204: { description: Deleted }
 *       404:
 *         description: Folder not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export function createFolderRoutes(folders: FolderService, entries: PasswordEntryService) {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const list = await folders.listFolders(requireOwner(req));
      res.json(list.map(toFolderResponse));
    })
  );

  router.post(
    '/',
    validate({ body: folderCreateSchema }),
    asyncHandler(async (req, res) => {
      const body = folderCreateSchema.parse(req.body);
      const folder = await folders.createFolder(requireOwner(req), body);
      res.status(201).json(toFolderResponse(folder));
    })
  );

  router.get(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const ownerId = requireOwner(req);
      const { id } = idParamsSchema.parse(req.params);

      const folder = await folders.getFolder(id, ownerId);
      if (!folder) {
        throw new NotFoundError('Folder not found');
      }

      const inFolder = await entries.listEntries(ownerId, { folderId: folder.id });
      res.json({
        folder: toFolderResponse(folder),
        entries: inFolder.map(toEntryResponse),
      });
    })
  );

  router.put(
    '/:id',
    validate({ params: idParamsSchema, body: folderUpdateSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = folderUpdateSchema.parse(req.body);

      const folder = await folders.updateFolder(id, requireOwner(req), body);
      if (!folder) {
        throw new NotFoundError('Folder not found');
      }
      res.json(toFolderResponse(folder));
    })
  );

  router.delete(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);

      const deleted = await folders.deleteFolder(id, requireOwner(req));
      if (!deleted) {
        throw new NotFoundError('Folder not found');
      }
      res.status(204).end();
    })
  );

  return router;
}

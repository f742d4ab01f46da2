import { Router } from 'express';
import { NotFoundError } from '../../../application/errors.js';
import { idParamsSchema, userCreateSchema } from '../../../application/vault/contracts.js';
import { toUserResponse } from '../../../application/vault/responses.js';
import type { UserService } from '../../../application/vault/userService.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requireOwner } from '../middleware/identity.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /api/users:
 *   post:
 *     tags: [Users]
 *     summary: Register a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, rawCredential]
 *             properties:
 *               username: { type: string, minLength: 3, maxLength: 50 }
 *               rawCredential: { type: string, minLength: 6 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Username already taken
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/me:
 *   get:
 *     tags: [Users]
 *     summary: The user the request acts for
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       404:
 *         description: Owner has not been created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user (only the acting user is visible)
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
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Users]
 *     summary: Delete a user with all its folders and entries
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       204: { description: Deleted }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export function createUserRoutes(users: UserService) {
  const router = Router();

  router.post(
    '/',
    validate({ body: userCreateSchema }),
    asyncHandler(async (req, res) => {
      const body = userCreateSchema.parse(req.body);
      const user = await users.createUser(body);
      res.status(201).json(toUserResponse(user));
    })
  );

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      const user = await users.getUserById(requireOwner(req));
      if (!user) {
        throw new NotFoundError('User not found');
      }
      res.json(toUserResponse(user));
    })
  );

  // Other users read as missing, the same way foreign folders and entries do
  router.get(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const user = id === requireOwner(req) ? await users.getUserById(id) : null;
      if (!user) {
        throw new NotFoundError('User not found');
      }
      res.json(toUserResponse(user));
    })
  );

  router.delete(
    '/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const deleted = id === requireOwner(req) && (await users.deleteUser(id));
      if (!deleted) {
        throw new NotFoundError('User not found');
      }
      res.status(204).end();
    })
  );

  return router;
}

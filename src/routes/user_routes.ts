import express from "express";
import { createUserController } from "../controllers/user_controller";
import { AppServices } from "../services/container";
import { createVerifyToken } from "../utils/auth_middleware";

/**
 * @swagger
 * tags:
 *   name: Users
 *   description: Profiles and roles
 */
export const createUserRouter = (services: AppServices) => {
  const router = express.Router();
  const controller = createUserController(services);
  const verifyToken = createVerifyToken(services.identity);

  /**
   * @swagger
   * /users/me:
   *   get:
   *     summary: Get own profile
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: The profile
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Profile'
   *       401:
   *         description: Missing or invalid token
   */
  router.get("/me", verifyToken, controller.getMe);

  /**
   * @swagger
   * /users/me:
   *   put:
   *     summary: Update own contact or face/QR consent
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               contact:
   *                 type: string
   *               consentFaceQr:
   *                 type: boolean
   *     responses:
   *       200:
   *         description: The updated profile
   *       400:
   *         description: No updatable fields or invalid values
   *       403:
   *         description: Attempt to change own role
   */
  router.put("/me", verifyToken, controller.updateMe);

  /**
   * @swagger
   * /users/{id}/role:
   *   put:
   *     summary: Set a user's role (administrators only)
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               role:
   *                 type: string
   *                 enum: [VOLUNTEER, ADMIN]
   *     responses:
   *       200:
   *         description: The updated profile
   *       403:
   *         description: Caller is not an administrator
   *       404:
   *         description: User not found
   */
  router.put("/:id/role", verifyToken, controller.setRole);

  return router;
};

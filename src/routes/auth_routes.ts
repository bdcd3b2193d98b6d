/** @format */

import express from "express";
import { createAuthController } from "../controllers/auth_controller";
import { AppServices } from "../services/container";
import { createVerifyToken } from "../utils/auth_middleware";

/**
 * @swagger
 * tags:
 *   name: Auth
 *   description: Registration and token management
 */

/**
 * @swagger
 * components:
 *   securitySchemes:
 *     bearerAuth:
 *       type: http
 *       scheme: bearer
 *       bearerFormat: JWT
 *   schemas:
 *     Profile:
 *       type: object
 *       properties:
 *         id:
 *           type: string
 *         role:
 *           type: string
 *           enum: [VOLUNTEER, ADMIN]
 *         contact:
 *           type: string
 *           description: Email address or phone number
 *         consentFaceQr:
 *           type: boolean
 *         createdAt:
 *           type: string
 *           format: date-time
 *     Tokens:
 *       type: object
 *       properties:
 *         accessToken:
 *           type: string
 *         refreshToken:
 *           type: string
 *         tokenType:
 *           type: string
 *           example: Bearer
 *         userId:
 *           type: string
 *     Error:
 *       type: object
 *       properties:
 *         success:
 *           type: boolean
 *           example: false
 *         error:
 *           type: string
 */
export const createAuthRouter = (services: AppServices) => {
  const router = express.Router();
  const controller = createAuthController(services);
  const verifyToken = createVerifyToken(services.identity);

  /**
   * @swagger
   * /auth/register:
   *   post:
   *     summary: Register a new user
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [contact, password]
   *             properties:
   *               contact:
   *                 type: string
   *               password:
   *                 type: string
   *                 minLength: 6
   *               role:
   *                 type: string
   *                 enum: [VOLUNTEER, ADMIN]
   *               consentFaceQr:
   *                 type: boolean
   *     responses:
   *       201:
   *         description: The created profile
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Profile'
   *       400:
   *         description: Missing or invalid fields
   *       403:
   *         description: Self-registration as ADMIN refused
   *       409:
   *         description: Contact already registered
   */
  router.post("/register", controller.register);

  /**
   * @swagger
   * /auth/token:
   *   post:
   *     summary: Exchange credentials for an access and a refresh token
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               contact:
   *                 type: string
   *               password:
   *                 type: string
   *         application/x-www-form-urlencoded:
   *           schema:
   *             type: object
   *             properties:
   *               username:
   *                 type: string
   *               password:
   *                 type: string
   *     responses:
   *       200:
   *         description: Tokens issued
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Tokens'
   *       401:
   *         description: Incorrect contact or password
   */
  router.post("/token", controller.token);

  /**
   * @swagger
   * /auth/refresh:
   *   post:
   *     summary: Rotate the refresh token
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               refreshToken:
   *                 type: string
   *     responses:
   *       200:
   *         description: New token pair
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Tokens'
   *       401:
   *         description: Invalid refresh token
   */
  router.post("/refresh", controller.refresh);

  /**
   * @swagger
   * /auth/logout:
   *   post:
   *     summary: Revoke a refresh token
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               refreshToken:
   *                 type: string
   *     responses:
   *       200:
   *         description: Logged out
   *       401:
   *         description: Invalid refresh token
   */
  router.post("/logout", controller.logout);

  /**
   * @swagger
   * /auth/me:
   *   get:
   *     summary: Get the authenticated user's profile
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Current profile
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Profile'
   *       401:
   *         description: Missing or invalid token
   */
  router.get("/me", verifyToken, controller.me);

  return router;
};

/** @format */

import express from "express";
import { createNotificationController } from "../controllers/notification_controller";
import { AppServices } from "../services/container";
import { createVerifyToken } from "../utils/auth_middleware";

/**
 * @swagger
 * tags:
 *   name: Notifications
 *   description: In-app notifications and simulated alerts
 */
export const createNotificationRouter = (services: AppServices) => {
  const router = express.Router();
  const controller = createNotificationController(services);
  const verifyToken = createVerifyToken(services.identity);

  /**
   * @swagger
   * /notifications:
   *   get:
   *     summary: List the authenticated user's notifications
   *     tags: [Notifications]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: unread
   *         schema:
   *           type: boolean
   *         description: Only return unread notifications
   *     responses:
   *       200:
   *         description: Notifications, newest first
   *       401:
   *         description: Missing or invalid token
   */
  router.get("/", verifyToken, controller.getUserNotifications);

  /**
   * @swagger
   * /notifications/send_mock:
   *   post:
   *     summary: Record a simulated SMS or call
   *     tags: [Notifications]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [recipient, message, type]
   *             properties:
   *               recipient:
   *                 type: string
   *               message:
   *                 type: string
   *               type:
   *                 type: string
   *                 enum: [SMS, CALL]
   *               matchId:
   *                 type: string
   *               reportId:
   *                 type: string
   *     responses:
   *       201:
   *         description: The logged notification
   *       400:
   *         description: Missing fields or unknown type
   */
  router.post("/send_mock", verifyToken, controller.sendMockNotification);

  /**
   * @swagger
   * /notifications/{id}/read:
   *   put:
   *     summary: Mark a notification as read
   *     tags: [Notifications]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: The updated notification
   *       403:
   *         description: Notification belongs to another user
   *       404:
   *         description: Notification not found
   */
  router.put("/:id/read", verifyToken, controller.markNotificationRead);

  return router;
};

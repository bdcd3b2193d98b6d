/** @format */

import express from "express";
import { createReportController } from "../controllers/report_controller";
import { AppServices } from "../services/container";
import { createVerifyToken } from "../utils/auth_middleware";
import { reportUpload } from "../utils/uploads";

/**
 * @swagger
 * tags:
 *   name: Reports
 *   description: Lost and found reports
 */

/**
 * @swagger
 * components:
 *   schemas:
 *     Report:
 *       type: object
 *       properties:
 *         id:
 *           type: string
 *         userId:
 *           type: string
 *         type:
 *           type: string
 *           enum: [LOST, FOUND]
 *         subjectType:
 *           type: string
 *           enum: [PERSON, ITEM]
 *         refIds:
 *           type: array
 *           items:
 *             type: string
 *         descriptionText:
 *           type: string
 *         language:
 *           type: string
 *         location:
 *           type: string
 *         photoUrls:
 *           type: array
 *           items:
 *             type: string
 *         audioTranscript:
 *           type: string
 *         status:
 *           type: string
 *           enum: [OPEN, MATCHED, REUNITED, CLOSED]
 *         createdAt:
 *           type: string
 *           format: date-time
 *     NewReport:
 *       type: object
 *       required: [subjectType, language, location]
 *       properties:
 *         subjectType:
 *           type: string
 *           enum: [PERSON, ITEM]
 *         refIds:
 *           type: string
 *           description: Comma-separated reference ids
 *         descriptionText:
 *           type: string
 *         language:
 *           type: string
 *         location:
 *           type: string
 *         photos:
 *           type: array
 *           maxItems: 5
 *           items:
 *             type: string
 *             format: binary
 *         audio:
 *           type: string
 *           format: binary
 */
export const createReportRouter = (services: AppServices) => {
  const router = express.Router();
  const controller = createReportController(services);
  const verifyToken = createVerifyToken(services.identity);

  /**
   * @swagger
   * /reports/lost:
   *   post:
   *     summary: Create a lost report
   *     tags: [Reports]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             $ref: '#/components/schemas/NewReport'
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/NewReport'
   *     responses:
   *       201:
   *         description: The created report
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Report'
   *       400:
   *         description: Invalid fields or files
   *       502:
   *         description: Photo upload failed
   */
  router.post("/lost", verifyToken, reportUpload, controller.createLostReport);

  /**
   * @swagger
   * /reports/found:
   *   post:
   *     summary: Create a found report
   *     description: The description may be dictated in the `audio` file instead of typed.
   *     tags: [Reports]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             $ref: '#/components/schemas/NewReport'
   *     responses:
   *       201:
   *         description: The created report
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Report'
   *       400:
   *         description: Invalid fields or files
   *       502:
   *         description: Photo upload failed
   */
  router.post("/found", verifyToken, reportUpload, controller.createFoundReport);

  /**
   * @swagger
   * /reports:
   *   get:
   *     summary: List reports, newest first
   *     tags: [Reports]
   *     parameters:
   *       - in: query
   *         name: type
   *         schema:
   *           type: string
   *           enum: [LOST, FOUND]
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [OPEN, MATCHED, REUNITED, CLOSED]
   *     responses:
   *       200:
   *         description: Matching reports
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/Report'
   *       400:
   *         description: Invalid filter
   */
  router.get("/", controller.listReports);

  /**
   * @swagger
   * /reports/{id}:
   *   get:
   *     summary: Get a report
   *     tags: [Reports]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: The report
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Report'
   *       404:
   *         description: Report not found
   */
  router.get("/:id", controller.getReportById);

  /**
   * @swagger
   * /reports/{id}/status:
   *   put:
   *     summary: Change a report's status (owner or administrator)
   *     tags: [Reports]
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
   *               status:
   *                 type: string
   *                 enum: [OPEN, MATCHED, REUNITED, CLOSED]
   *     responses:
   *       200:
   *         description: The updated report
   *       403:
   *         description: Not the owner
   *       404:
   *         description: Report not found
   */
  router.put("/:id/status", verifyToken, controller.updateReportStatus);

  return router;
};

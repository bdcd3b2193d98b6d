import express from "express";
import { createMatchController } from "../controllers/match_controller";
import { AppServices } from "../services/container";
import { createVerifyToken } from "../utils/auth_middleware";

/**
 * @swagger
 * tags:
 *   name: Matches
 *   description: Proposed pairings of lost and found reports
 */

/**
 * @swagger
 * components:
 *   schemas:
 *     Match:
 *       type: object
 *       properties:
 *         id:
 *           type: string
 *         lostReportId:
 *           type: string
 *         foundReportId:
 *           type: string
 *         scores:
 *           type: object
 *           additionalProperties:
 *             type: number
 *         fusedScore:
 *           type: number
 *         status:
 *           type: string
 *           enum: [PENDING, CONFIRMED, REJECTED]
 *         proposedBy:
 *           type: string
 *         createdAt:
 *           type: string
 *           format: date-time
 *         updatedAt:
 *           type: string
 *           format: date-time
 */
export const createMatchRouter = (services: AppServices) => {
  const router = express.Router();
  const controller = createMatchController(services);
  const verifyToken = createVerifyToken(services.identity);

  /**
   * @swagger
   * /matches:
   *   post:
   *     summary: Propose a match between a lost and a found report
   *     tags: [Matches]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [lostReportId, foundReportId]
   *             properties:
   *               lostReportId:
   *                 type: string
   *               foundReportId:
   *                 type: string
   *               scores:
   *                 type: object
   *                 additionalProperties:
   *                   type: number
   *               fusedScore:
   *                 type: number
   *                 minimum: 0
   *                 maximum: 1
   *     responses:
   *       201:
   *         description: The created match
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Match'
   *       400:
   *         description: Invalid ids or report types
   *       404:
   *         description: Report not found
   *       409:
   *         description: Pair already matched or a report is closed
   */
  router.post("/", verifyToken, controller.proposeMatch);

  /**
   * @swagger
   * /matches:
   *   get:
   *     summary: List matches, newest first
   *     tags: [Matches]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [PENDING, CONFIRMED, REJECTED]
   *     responses:
   *       200:
   *         description: Matches
   */
  router.get("/", verifyToken, controller.listMatches);

  /**
   * @swagger
   * /matches/report/{id}:
   *   get:
   *     summary: List the matches a report takes part in
   *     tags: [Matches]
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
   *         description: Matches for the report
   *       404:
   *         description: Report not found
   */
  router.get("/report/:id", verifyToken, controller.getMatchesForReport);

  /**
   * @swagger
   * /matches/{id}/status:
   *   post:
   *     summary: Confirm or reject a match
   *     tags: [Matches]
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
   *                 enum: [PENDING, CONFIRMED, REJECTED]
   *     responses:
   *       200:
   *         description: The updated match
   *       400:
   *         description: Invalid status
   *       403:
   *         description: Not an administrator or report owner
   *       404:
   *         description: Match not found
   *       409:
   *         description: Match already reviewed
   */
  router.post("/:id/status", verifyToken, controller.setMatchStatus);

  return router;
};

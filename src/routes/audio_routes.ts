import express from "express";
import { createAudioController } from "../controllers/audio_controller";
import { AppServices } from "../services/container";
import { createVerifyToken } from "../utils/auth_middleware";
import { audioUpload } from "../utils/uploads";

export const createAudioRouter = (services: AppServices) => {
  const router = express.Router();
  const controller = createAudioController(services);

  /**
   * @swagger
   * /transcribe-audio:
   *   post:
   *     summary: Transcribe an audio recording to text
   *     tags: [Reports]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             type: object
   *             properties:
   *               audio:
   *                 type: string
   *                 format: binary
   *     responses:
   *       200:
   *         description: The transcribed text
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 transcribedText:
   *                   type: string
   *       400:
   *         description: Missing or non-audio file
   *       500:
   *         description: Transcription failed
   *       503:
   *         description: No transcriber configured
   */
  router.post("/transcribe-audio", createVerifyToken(services.identity), audioUpload, controller.transcribeAudio);

  return router;
};

import { Request, Response } from "express";
import { AppServices } from "../services/container";
import { ServiceUnavailableError, ValidationError, sendError } from "../utils/errors";
import { uploadedFile } from "../utils/uploads";

export const createAudioController = ({ transcriber }: AppServices) => {
  const transcribeAudio = async (req: Request, res: Response) => {
    try {
      if (!transcriber) {
        throw new ServiceUnavailableError("Audio transcription is not configured");
      }
      const audio = uploadedFile(req);
      if (!audio) {
        throw new ValidationError("Missing required file: audio");
      }
      const transcribedText = await transcriber.transcribe(audio.buffer, audio.mimetype);
      if (!transcribedText) {
        res.status(500).json({ success: false, error: "Audio transcription failed." });
        return;
      }
      res.status(200).json({ transcribedText });
    } catch (error) {
      sendError(res, error, "Error transcribing audio");
    }
  };

  return { transcribeAudio };
};

import { Request } from "express";
import multer from "multer";
import { MAX_PHOTOS, UploadedFile } from "../services/report-service";
import { ValidationError } from "./errors";

const MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Files are kept in memory and handed to the object store or transcriber. */
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_FILE_SIZE },
  fileFilter: (req, file, cb) => {
    if (file.fieldname === "photos" && !file.mimetype.startsWith("image/")) {
      cb(new ValidationError(`File ${file.originalname} is not an image`));
      return;
    }
    if (file.fieldname === "audio" && !file.mimetype.startsWith("audio/")) {
      cb(new ValidationError(`File ${file.originalname} is not an audio file`));
      return;
    }
    cb(null, true);
  },
});

export const reportUpload = upload.fields([
  { name: "photos", maxCount: MAX_PHOTOS },
  { name: "audio", maxCount: 1 },
]);

export const audioUpload = upload.single("audio");

export const uploadedFiles = (req: Request, field: string): UploadedFile[] => {
  const files = req.files;
  if (!files || Array.isArray(files)) return [];
  return files[field] ?? [];
};

export const uploadedFile = (req: Request): UploadedFile | undefined => req.file;

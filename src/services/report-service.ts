import {
  Report,
  ReportFilter,
  ReportType,
  isReportStatus,
  isReportType,
  isSubjectType,
} from "../models/report_model";
import { AuthError, HttpError, StorageError, ValidationError } from "../utils/errors";
import { Actor } from "./identity-service";
import { NotificationService } from "./notification-service";
import { ObjectStore } from "./object-store";
import { ReportStore } from "./report-store";
import { Transcriber } from "./transcription-service";

export const MAX_PHOTOS = 5;

/** The parts of an uploaded multipart file the service reads. */
export interface UploadedFile {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
}

export interface CreateReportInput {
  subjectType?: unknown;
  refIds?: unknown;
  descriptionText?: unknown;
  language?: unknown;
  location?: unknown;
  photos: UploadedFile[];
  audio?: UploadedFile;
}

const requiredString = (value: unknown, field: string): string => {
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`Missing required field: ${field}`);
  }
  return value.trim();
};

/** Accepts `"a, b"`, `["a", "b"]` or repeated form fields; drops empty entries. */
export const parseRefIds = (value: unknown): string[] => {
  if (value === undefined || value === null || value === "") return [];
  const parts: unknown[] = Array.isArray(value) ? value : [value];
  const ids: string[] = [];
  for (const part of parts) {
    if (typeof part !== "string") {
      throw new ValidationError("refIds must be a comma-separated string or an array of strings");
    }
    ids.push(
      ...part
        .split(",")
        .map((id) => id.trim())
        .filter(Boolean)
    );
  }
  return ids;
};

export class ReportService {
  constructor(
    private readonly store: ReportStore,
    private readonly objects: ObjectStore,
    private readonly notifications: NotificationService,
    private readonly transcriber: Transcriber | null
  ) {}

  /**
   * Uploads the photos first and inserts the row after. A failure at either
   * step removes the images already uploaded, so no report points at missing
   * photos and no photo is left without a report.
   */
  async createReport(type: ReportType, input: CreateReportInput, reporterId: string): Promise<Report> {
    if (!isSubjectType(input.subjectType)) {
      throw new ValidationError("subjectType must be 'PERSON' or 'ITEM'");
    }
    const subjectType = input.subjectType;
    const language = requiredString(input.language, "language");
    const location = requiredString(input.location, "location");
    const refIds = parseRefIds(input.refIds);

    if (input.photos.length > MAX_PHOTOS) {
      throw new ValidationError(`At most ${MAX_PHOTOS} photos can be attached`);
    }
    const notImage = input.photos.find((photo) => !photo.mimetype.startsWith("image/"));
    if (notImage) {
      throw new ValidationError(`File ${notImage.originalname} is not an image`);
    }

    let descriptionText =
      typeof input.descriptionText === "string" ? input.descriptionText.trim() : "";
    let audioTranscript: string | undefined;
    if (input.audio) {
      audioTranscript = await this.transcribeAudio(input.audio);
      if (audioTranscript) {
        descriptionText = descriptionText ? `${audioTranscript} ${descriptionText}` : audioTranscript;
      }
    }
    if (!descriptionText) {
      throw new ValidationError("Description text or audio file is required");
    }

    const photoUrls = await this.uploadPhotos(type, input.photos);

    let report: Report;
    try {
      report = await this.store.createReport(type, {
        userId: reporterId,
        subjectType,
        refIds,
        descriptionText,
        language,
        location,
        photoUrls,
        audioTranscript,
      });
    } catch (error) {
      await this.discardPhotos(photoUrls);
      throw error;
    }

    console.log(`Created ${type} report: ${report.id}`);
    this.notifications.broadcast({
      type: "new_report",
      reportId: report.id,
      reportType: report.type,
      subjectType: report.subjectType,
    });
    return report;
  }

  getReport(id: string): Promise<Report> {
    return this.store.getReport(id);
  }

  listReports(filter: { type?: unknown; status?: unknown }): Promise<Report[]> {
    const query: ReportFilter = {};
    if (filter.type !== undefined) {
      if (!isReportType(filter.type)) {
        throw new ValidationError("type must be 'LOST' or 'FOUND'");
      }
      query.type = filter.type;
    }
    if (filter.status !== undefined) {
      if (!isReportStatus(filter.status)) {
        throw new ValidationError("status must be one of OPEN, MATCHED, REUNITED, CLOSED");
      }
      query.status = filter.status;
    }
    return this.store.listReports(query);
  }

  async updateReportStatus(actor: Actor, id: string, status: unknown): Promise<Report> {
    if (!isReportStatus(status)) {
      throw new ValidationError("status must be one of OPEN, MATCHED, REUNITED, CLOSED");
    }
    const report = await this.store.getReport(id);
    if (actor.role !== "ADMIN" && report.userId !== actor.userId) {
      throw new AuthError("Not authorized to update this report", 403);
    }
    if (report.status === status) return report;
    return this.store.updateStatus(id, status);
  }

  private async transcribeAudio(audio: UploadedFile): Promise<string | undefined> {
    if (!audio.mimetype.startsWith("audio/")) {
      throw new ValidationError(`File ${audio.originalname} is not an audio file`);
    }
    if (!this.transcriber) {
      console.warn("Audio attached to report but no transcriber is configured, ignoring it");
      return undefined;
    }
    const transcript = await this.transcriber.transcribe(audio.buffer, audio.mimetype);
    if (!transcript) {
      console.warn("Audio transcription failed, continuing without transcript");
      return undefined;
    }
    return transcript;
  }

  private async uploadPhotos(type: ReportType, photos: UploadedFile[]): Promise<string[]> {
    const folder = type === "LOST" ? "lost_reports" : "found_reports";
    const urls: string[] = [];
    for (const photo of photos) {
      try {
        urls.push(
          await this.objects.putImage({
            bytes: photo.buffer,
            folder,
            filename: photo.originalname,
            contentType: photo.mimetype,
          })
        );
      } catch (error) {
        await this.discardPhotos(urls);
        if (error instanceof HttpError) throw error;
        const message = error instanceof Error ? error.message : String(error);
        throw new StorageError(`Failed to upload image: ${message}`);
      }
    }
    return urls;
  }

  private async discardPhotos(urls: string[]): Promise<void> {
    const results = await Promise.allSettled(urls.map((url) => this.objects.removeImage(url)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        console.error(`Failed to remove orphaned image ${urls[index]}:`, result.reason);
      }
    });
  }
}

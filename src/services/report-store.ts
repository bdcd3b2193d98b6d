import mongoose, { FilterQuery, HydratedDocument } from "mongoose";
import reportModel, {
  IReport,
  NewReport,
  Report,
  ReportFilter,
  ReportStatus,
  ReportType,
} from "../models/report_model";
import { NotFoundError } from "../utils/errors";

export interface ReportStore {
  createReport(type: ReportType, payload: NewReport): Promise<Report>;
  /** Throws NotFoundError for unknown or malformed ids. */
  getReport(id: string): Promise<Report>;
  /** Newest first. */
  listReports(filter: ReportFilter): Promise<Report[]>;
  updateStatus(id: string, status: ReportStatus): Promise<Report>;
}

export const toReport = (doc: HydratedDocument<IReport>): Report => ({
  id: doc._id.toString(),
  userId: doc.userId,
  type: doc.type,
  subjectType: doc.subjectType,
  refIds: [...doc.refIds],
  descriptionText: doc.descriptionText,
  language: doc.language,
  location: doc.location,
  photoUrls: [...doc.photoUrls],
  audioTranscript: doc.audioTranscript,
  status: doc.status,
  createdAt: doc.createdAt ?? new Date(),
});

export class MongoReportStore implements ReportStore {
  async createReport(type: ReportType, payload: NewReport): Promise<Report> {
    const doc = await reportModel.create({ ...payload, type, status: "OPEN" });
    return toReport(doc);
  }

  async getReport(id: string): Promise<Report> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      throw new NotFoundError("Report not found");
    }
    const doc = await reportModel.findById(id);
    if (!doc) {
      throw new NotFoundError("Report not found");
    }
    return toReport(doc);
  }

  async listReports(filter: ReportFilter): Promise<Report[]> {
    const query: FilterQuery<IReport> = {};
    if (filter.type) query.type = filter.type;
    if (filter.status) query.status = filter.status;
    const docs = await reportModel.find(query).sort({ createdAt: -1 });
    return docs.map(toReport);
  }

  async updateStatus(id: string, status: ReportStatus): Promise<Report> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      throw new NotFoundError("Report not found");
    }
    const doc = await reportModel.findByIdAndUpdate(id, { status }, { new: true });
    if (!doc) {
      throw new NotFoundError("Report not found");
    }
    return toReport(doc);
  }
}

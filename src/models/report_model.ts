import mongoose from "mongoose";

export const REPORT_TYPES = ["LOST", "FOUND"] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export const SUBJECT_TYPES = ["PERSON", "ITEM"] as const;
export type SubjectType = (typeof SUBJECT_TYPES)[number];

export const REPORT_STATUSES = ["OPEN", "MATCHED", "REUNITED", "CLOSED"] as const;
export type ReportStatus = (typeof REPORT_STATUSES)[number];

export const isReportType = (value: unknown): value is ReportType =>
  REPORT_TYPES.some((candidate) => candidate === value);

export const isSubjectType = (value: unknown): value is SubjectType =>
  SUBJECT_TYPES.some((candidate) => candidate === value);

export const isReportStatus = (value: unknown): value is ReportStatus =>
  REPORT_STATUSES.some((candidate) => candidate === value);

export interface IReport {
  userId: string;
  type: ReportType;
  subjectType: SubjectType;
  refIds: string[];
  descriptionText: string;
  language: string;
  location: string;
  photoUrls: string[];
  audioTranscript?: string;
  status: ReportStatus;
  createdAt?: Date;
}

export interface Report extends Omit<IReport, "createdAt"> {
  id: string;
  createdAt: Date;
}

/** Everything the caller supplies when a report row is inserted. */
export type NewReport = Omit<IReport, "type" | "status" | "createdAt">;

export interface ReportFilter {
  type?: ReportType;
  status?: ReportStatus;
}

const reportSchema = new mongoose.Schema<IReport>(
  {
    userId: {
      type: String,
      required: true,
      index: true,
    },
    type: {
      type: String,
      enum: REPORT_TYPES,
      required: true,
    },
    subjectType: {
      type: String,
      enum: SUBJECT_TYPES,
      required: true,
    },
    refIds: {
      type: [String],
      default: [],
    },
    descriptionText: {
      type: String,
      required: true,
    },
    language: {
      type: String,
      required: true,
    },
    location: {
      type: String,
      required: true,
    },
    photoUrls: {
      type: [String],
      default: [],
    },
    audioTranscript: {
      type: String,
    },
    status: {
      type: String,
      enum: REPORT_STATUSES,
      default: "OPEN",
    },
  },
  { timestamps: true }
);

const reportModel = mongoose.model<IReport>("reports", reportSchema);

export default reportModel;

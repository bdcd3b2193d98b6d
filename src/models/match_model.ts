import mongoose from "mongoose";

export const MATCH_STATUSES = ["PENDING", "CONFIRMED", "REJECTED"] as const;
export type MatchStatus = (typeof MATCH_STATUSES)[number];

export const isMatchStatus = (value: unknown): value is MatchStatus =>
  MATCH_STATUSES.some((candidate) => candidate === value);

export interface IMatch {
  lostReportId: string;
  foundReportId: string;
  scores: Record<string, number>;
  fusedScore?: number;
  status: MatchStatus;
  proposedBy: string;
  createdAt?: Date;
  updatedAt?: Date;
}

export interface Match extends Omit<IMatch, "createdAt" | "updatedAt"> {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewMatch = Omit<IMatch, "status" | "createdAt" | "updatedAt">;

const matchSchema = new mongoose.Schema<IMatch>(
  {
    lostReportId: {
      type: String,
      required: true,
      index: true,
    },
    foundReportId: {
      type: String,
      required: true,
      index: true,
    },
    scores: {
      type: mongoose.Schema.Types.Mixed,
      default: {},
    },
    fusedScore: {
      type: Number,
    },
    status: {
      type: String,
      enum: MATCH_STATUSES,
      default: "PENDING",
    },
    proposedBy: {
      type: String,
      required: true,
    },
  },
  { timestamps: true }
);

matchSchema.index({ lostReportId: 1, foundReportId: 1 }, { unique: true });

const matchModel = mongoose.model<IMatch>("matches", matchSchema);

export default matchModel;

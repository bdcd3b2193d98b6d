import mongoose, { FilterQuery, HydratedDocument } from "mongoose";
import matchModel, { IMatch, Match, MatchStatus, NewMatch } from "../models/match_model";
import { ConflictError, NotFoundError } from "../utils/errors";

export interface MatchStore {
  createMatch(match: NewMatch): Promise<Match>;
  /** Throws NotFoundError for unknown or malformed ids. */
  getMatch(id: string): Promise<Match>;
  findMatchForPair(lostReportId: string, foundReportId: string): Promise<Match | null>;
  /** Matches where the report is either the lost or the found side, newest first. */
  getMatchesForReport(reportId: string): Promise<Match[]>;
  listMatches(status?: MatchStatus): Promise<Match[]>;
  /**
   * Moves the match to `status` only while it still has status `from`.
   * Returns null when it no longer does; throws NotFoundError for unknown ids.
   */
  setMatchStatus(id: string, status: MatchStatus, from: MatchStatus): Promise<Match | null>;
}

export const toMatch = (doc: HydratedDocument<IMatch>): Match => ({
  id: doc._id.toString(),
  lostReportId: doc.lostReportId,
  foundReportId: doc.foundReportId,
  scores: { ...doc.scores },
  fusedScore: doc.fusedScore,
  status: doc.status,
  proposedBy: doc.proposedBy,
  createdAt: doc.createdAt ?? new Date(),
  updatedAt: doc.updatedAt ?? doc.createdAt ?? new Date(),
});

export class MongoMatchStore implements MatchStore {
  async createMatch(match: NewMatch): Promise<Match> {
    try {
      const doc = await matchModel.create({ ...match, status: "PENDING" });
      return toMatch(doc);
    } catch (error) {
      if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
        throw new ConflictError("A match for these reports already exists");
      }
      throw error;
    }
  }

  async getMatch(id: string): Promise<Match> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      throw new NotFoundError("Match not found");
    }
    const doc = await matchModel.findById(id);
    if (!doc) {
      throw new NotFoundError("Match not found");
    }
    return toMatch(doc);
  }

  async findMatchForPair(lostReportId: string, foundReportId: string): Promise<Match | null> {
    const doc = await matchModel.findOne({ lostReportId, foundReportId });
    return doc ? toMatch(doc) : null;
  }

  async getMatchesForReport(reportId: string): Promise<Match[]> {
    const docs = await matchModel
      .find({ $or: [{ lostReportId: reportId }, { foundReportId: reportId }] })
      .sort({ createdAt: -1 });
    return docs.map(toMatch);
  }

  async listMatches(status?: MatchStatus): Promise<Match[]> {
    const query: FilterQuery<IMatch> = {};
    if (status) query.status = status;
    const docs = await matchModel.find(query).sort({ createdAt: -1 });
    return docs.map(toMatch);
  }

  async setMatchStatus(id: string, status: MatchStatus, from: MatchStatus): Promise<Match | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      throw new NotFoundError("Match not found");
    }
    const doc = await matchModel.findOneAndUpdate({ _id: id, status: from }, { status }, { new: true });
    if (doc) return toMatch(doc);
    if (!(await matchModel.exists({ _id: id }))) {
      throw new NotFoundError("Match not found");
    }
    return null;
  }
}

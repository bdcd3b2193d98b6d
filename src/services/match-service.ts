import { Match, MATCH_STATUSES, isMatchStatus } from "../models/match_model";
import { Report } from "../models/report_model";
import { AuthError, ConflictError, ValidationError } from "../utils/errors";
import { RealtimeMessage } from "./connection-registry";
import { Actor, Identity } from "./identity-service";
import { InAppNotification, NotificationService } from "./notification-service";
import { MatchStore } from "./match-store";
import { ReportStore } from "./report-store";

export interface ProposeMatchInput {
  lostReportId?: unknown;
  foundReportId?: unknown;
  scores?: unknown;
  fusedScore?: unknown;
}

const CLOSED_REPORT_STATUSES = ["REUNITED", "CLOSED"];

const parseScores = (value: unknown): Record<string, number> => {
  if (value === undefined || value === null) return {};
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new ValidationError("scores must be an object of numbers");
  }
  const scores: Record<string, number> = {};
  for (const [modality, score] of Object.entries(value)) {
    if (typeof score !== "number" || !Number.isFinite(score)) {
      throw new ValidationError(`scores.${modality} must be a number`);
    }
    scores[modality] = score;
  }
  return scores;
};

const parseFusedScore = (value: unknown): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError("fusedScore must be a number between 0 and 1");
  }
  return value;
};

const requiredId = (value: unknown, field: string): string => {
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`Missing required field: ${field}`);
  }
  return value.trim();
};

export class MatchService {
  constructor(
    private readonly matches: MatchStore,
    private readonly reports: ReportStore,
    private readonly notifications: NotificationService
  ) {}

  /** Records a reviewer's proposal that a lost and a found report describe the same subject. */
  async proposeMatch(actor: Identity, input: ProposeMatchInput): Promise<Match> {
    const lostReportId = requiredId(input.lostReportId, "lostReportId");
    const foundReportId = requiredId(input.foundReportId, "foundReportId");
    const scores = parseScores(input.scores);
    const fusedScore = parseFusedScore(input.fusedScore);

    const lost = await this.reports.getReport(lostReportId);
    const found = await this.reports.getReport(foundReportId);
    if (lost.type !== "LOST") {
      throw new ValidationError("lostReportId must reference a LOST report");
    }
    if (found.type !== "FOUND") {
      throw new ValidationError("foundReportId must reference a FOUND report");
    }
    for (const report of [lost, found]) {
      if (CLOSED_REPORT_STATUSES.includes(report.status)) {
        throw new ConflictError(`Report ${report.id} is already ${report.status}`);
      }
    }
    if (await this.matches.findMatchForPair(lost.id, found.id)) {
      throw new ConflictError("A match for these reports already exists");
    }

    const match = await this.matches.createMatch({
      lostReportId: lost.id,
      foundReportId: found.id,
      scores,
      fusedScore,
      proposedBy: actor.userId,
    });
    for (const report of [lost, found]) {
      if (report.status === "OPEN") {
        await this.reports.updateStatus(report.id, "MATCHED");
      }
    }
    console.log(`Match ${match.id} proposed for reports ${lost.id} and ${found.id}`);

    await this.notifyOwners(
      [lost, found],
      {
        type: "NEW_MATCH",
        title: "New Potential Match",
        message: "A lost report and a found report were matched. Please review the match.",
        matchId: match.id,
      },
      { type: "new_match", matchId: match.id, lostReportId: lost.id, foundReportId: found.id }
    );
    return match;
  }

  async getMatchesForReport(reportId: string): Promise<Match[]> {
    await this.reports.getReport(reportId);
    return this.matches.getMatchesForReport(reportId);
  }

  listMatches(status?: unknown): Promise<Match[]> {
    if (status === undefined) return this.matches.listMatches();
    if (!isMatchStatus(status)) {
      throw new ValidationError(`status must be one of ${MATCH_STATUSES.join(", ")}`);
    }
    return this.matches.listMatches(status);
  }

  /**
   * Reviews a match. Only PENDING matches change status; CONFIRMED reunites
   * both reports and REJECTED reopens a report left with no other live match.
   */
  async setMatchStatus(actor: Actor, matchId: string, status: unknown): Promise<Match> {
    if (!isMatchStatus(status)) {
      throw new ValidationError(`status must be one of ${MATCH_STATUSES.join(", ")}`);
    }
    const match = await this.matches.getMatch(matchId);
    const lost = await this.reports.getReport(match.lostReportId);
    const found = await this.reports.getReport(match.foundReportId);

    const isOwner = lost.userId === actor.userId || found.userId === actor.userId;
    if (actor.role !== "ADMIN" && !isOwner) {
      throw new AuthError("Not authorized to review this match", 403);
    }
    if (match.status === status) return match;
    if (match.status !== "PENDING") {
      throw new ConflictError(`Match is already ${match.status}`);
    }

    const updated = await this.matches.setMatchStatus(match.id, status, "PENDING");
    if (!updated) {
      const current = await this.matches.getMatch(match.id);
      throw new ConflictError(`Match is already ${current.status}`);
    }
    if (status === "CONFIRMED") {
      await this.reports.updateStatus(lost.id, "REUNITED");
      await this.reports.updateStatus(found.id, "REUNITED");
    } else if (status === "REJECTED") {
      await this.reopenIfUnmatched(lost, match.id);
      await this.reopenIfUnmatched(found, match.id);
    }
    console.log(`Match ${match.id} set to ${status} by ${actor.userId}`);

    await this.notifyOwners(
      [lost, found],
      {
        type: `MATCH_${status}`,
        title: status === "CONFIRMED" ? "Match Confirmed!" : "Match Rejected",
        message:
          status === "CONFIRMED"
            ? "A match involving your report was confirmed."
            : "A match involving your report was rejected.",
        matchId: match.id,
      },
      { type: "match_status", matchId: match.id, status }
    );
    return updated;
  }

  private async reopenIfUnmatched(report: Report, rejectedMatchId: string) {
    if (report.status !== "MATCHED") return;
    const others = await this.matches.getMatchesForReport(report.id);
    const live = others.some(
      (m) => m.id !== rejectedMatchId && (m.status === "PENDING" || m.status === "CONFIRMED")
    );
    if (!live) {
      await this.reports.updateStatus(report.id, "OPEN");
    }
  }

  private async notifyOwners(reports: Report[], notification: InAppNotification, realtime: RealtimeMessage) {
    const owners = new Set(reports.map((report) => report.userId));
    for (const ownerId of owners) {
      try {
        await this.notifications.notifyUser(ownerId, notification, realtime);
      } catch (error) {
        console.error(`Error notifying user ${ownerId}:`, error);
      }
    }
  }
}

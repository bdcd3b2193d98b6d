import { Request, Response } from "express";
import { AppServices } from "../services/container";
import { currentUserId } from "../utils/auth_middleware";
import { sendError } from "../utils/errors";

export const createMatchController = ({ identity, matches }: AppServices) => {
  const proposeMatch = async (req: Request, res: Response) => {
    try {
      const match = await matches.proposeMatch(
        { userId: currentUserId(res) },
        {
          lostReportId: req.body.lostReportId,
          foundReportId: req.body.foundReportId,
          scores: req.body.scores,
          fusedScore: req.body.fusedScore,
        }
      );
      res.status(201).json(match);
    } catch (error) {
      sendError(res, error, "Error proposing match");
    }
  };

  const listMatches = async (req: Request, res: Response) => {
    try {
      const status = Array.isArray(req.query.status) ? req.query.status[0] : req.query.status;
      const result = await matches.listMatches(status);
      res.status(200).json(result);
    } catch (error) {
      sendError(res, error, "Error fetching matches");
    }
  };

  const getMatchesForReport = async (req: Request, res: Response) => {
    try {
      const result = await matches.getMatchesForReport(req.params.id);
      res.status(200).json(result);
    } catch (error) {
      sendError(res, error, "Error fetching matches for report");
    }
  };

  const setMatchStatus = async (req: Request, res: Response) => {
    try {
      const actor = await identity.resolveActor({ userId: currentUserId(res) });
      const match = await matches.setMatchStatus(actor, req.params.id, req.body.status);
      res.status(200).json(match);
    } catch (error) {
      sendError(res, error, "Error updating match status");
    }
  };

  return { proposeMatch, listMatches, getMatchesForReport, setMatchStatus };
};

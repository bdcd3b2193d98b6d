/** @format */

import { Request, Response } from "express";
import { ReportType } from "../models/report_model";
import { AppServices } from "../services/container";
import { currentUserId } from "../utils/auth_middleware";
import { sendError } from "../utils/errors";
import { uploadedFiles } from "../utils/uploads";

const firstQueryValue = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value);

export const createReportController = ({ identity, reports }: AppServices) => {
  const createReport = (type: ReportType) => async (req: Request, res: Response) => {
    try {
      const [audio] = uploadedFiles(req, "audio");
      const report = await reports.createReport(
        type,
        {
          subjectType: req.body.subjectType,
          refIds: req.body.refIds,
          descriptionText: req.body.descriptionText,
          language: req.body.language,
          location: req.body.location,
          photos: uploadedFiles(req, "photos"),
          audio,
        },
        currentUserId(res)
      );
      res.status(201).json(report);
    } catch (error) {
      sendError(res, error, `Error creating ${type} report`);
    }
  };

  const listReports = async (req: Request, res: Response) => {
    try {
      const result = await reports.listReports({
        type: firstQueryValue(req.query.type ?? req.query.kind),
        status: firstQueryValue(req.query.status),
      });
      res.status(200).json(result);
    } catch (error) {
      sendError(res, error, "Error fetching reports");
    }
  };

  const getReportById = async (req: Request, res: Response) => {
    try {
      const report = await reports.getReport(req.params.id);
      res.status(200).json(report);
    } catch (error) {
      sendError(res, error, "Error fetching report");
    }
  };

  const updateReportStatus = async (req: Request, res: Response) => {
    try {
      const actor = await identity.resolveActor({ userId: currentUserId(res) });
      const report = await reports.updateReportStatus(actor, req.params.id, req.body.status);
      res.status(200).json(report);
    } catch (error) {
      sendError(res, error, "Error updating report status");
    }
  };

  return {
    createLostReport: createReport("LOST"),
    createFoundReport: createReport("FOUND"),
    listReports,
    getReportById,
    updateReportStatus,
  };
};

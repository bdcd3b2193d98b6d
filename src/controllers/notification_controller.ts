import { Request, Response } from "express";
import { AppServices } from "../services/container";
import { currentUserId } from "../utils/auth_middleware";
import { sendError } from "../utils/errors";

export const createNotificationController = ({ notifications }: AppServices) => {
  const getUserNotifications = async (req: Request, res: Response) => {
    try {
      const result = await notifications.listForUser(currentUserId(res), req.query.unread === "true");
      res.status(200).json(result);
    } catch (error) {
      sendError(res, error, "Failed to fetch notifications");
    }
  };

  const markNotificationRead = async (req: Request, res: Response) => {
    try {
      const notification = await notifications.markRead(currentUserId(res), req.params.id);
      res.status(200).json(notification);
    } catch (error) {
      sendError(res, error, "Failed to update notification");
    }
  };

  const sendMockNotification = async (req: Request, res: Response) => {
    try {
      const entry = await notifications.sendMock({
        recipient: req.body.recipient,
        message: req.body.message,
        type: req.body.type,
        matchId: req.body.matchId,
        reportId: req.body.reportId,
      });
      res.status(201).json(entry);
    } catch (error) {
      sendError(res, error, "Failed to log notification");
    }
  };

  return { getUserNotifications, markNotificationRead, sendMockNotification };
};

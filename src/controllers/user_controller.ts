import { Request, Response } from "express";
import { AppServices } from "../services/container";
import { currentUserId } from "../utils/auth_middleware";
import { sendError } from "../utils/errors";

export const createUserController = ({ identity }: AppServices) => {
  const getMe = async (req: Request, res: Response) => {
    try {
      const profile = await identity.getProfile({ userId: currentUserId(res) });
      res.status(200).json(profile);
    } catch (error) {
      sendError(res, error, "Error fetching profile");
    }
  };

  const updateMe = async (req: Request, res: Response) => {
    try {
      const fields: Record<string, unknown> = { ...req.body };
      const profile = await identity.updateProfile({ userId: currentUserId(res) }, fields);
      res.status(200).json(profile);
    } catch (error) {
      sendError(res, error, "Error updating profile");
    }
  };

  const setRole = async (req: Request, res: Response) => {
    try {
      const actor = await identity.resolveActor({ userId: currentUserId(res) });
      const profile = await identity.setRole(actor, req.params.id, req.body.role);
      res.status(200).json(profile);
    } catch (error) {
      sendError(res, error, "Error setting role");
    }
  };

  return { getMe, updateMe, setRole };
};

/** @format */

import { Request, Response } from "express";
import { AppServices } from "../services/container";
import { currentUserId } from "../utils/auth_middleware";
import { sendError } from "../utils/errors";

export const createAuthController = ({ identity }: AppServices) => {
  const register = async (req: Request, res: Response) => {
    try {
      const profile = await identity.register({
        contact: req.body.contact ?? req.body.email,
        password: req.body.password,
        role: req.body.role,
        consentFaceQr: req.body.consentFaceQr,
      });
      res.status(201).json(profile);
    } catch (error) {
      sendError(res, error, "Error registering user");
    }
  };

  /** Accepts JSON or an OAuth2-style form where the contact arrives as `username`. */
  const token = async (req: Request, res: Response) => {
    try {
      const tokens = await identity.authenticate({
        contact: req.body.contact ?? req.body.username,
        password: req.body.password,
      });
      res.status(200).json({ ...tokens, tokenType: "Bearer" });
    } catch (error) {
      sendError(res, error, "Error issuing token");
    }
  };

  const refresh = async (req: Request, res: Response) => {
    try {
      const tokens = await identity.refresh(req.body.refreshToken);
      res.status(200).json({ ...tokens, tokenType: "Bearer" });
    } catch (error) {
      sendError(res, error, "Error refreshing token");
    }
  };

  const logout = async (req: Request, res: Response) => {
    try {
      await identity.logout(req.body.refreshToken);
      res.status(200).json({ success: true, message: "Logged out" });
    } catch (error) {
      sendError(res, error, "Error logging out");
    }
  };

  const me = async (req: Request, res: Response) => {
    try {
      const profile = await identity.getProfile({ userId: currentUserId(res) });
      res.status(200).json(profile);
    } catch (error) {
      sendError(res, error, "Error fetching current user");
    }
  };

  return { register, token, refresh, logout, me };
};

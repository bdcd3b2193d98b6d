import mongoose from "mongoose";

export const ROLES = ["VOLUNTEER", "ADMIN"] as const;
export type Role = (typeof ROLES)[number];

export const isRole = (value: unknown): value is Role =>
  ROLES.some((candidate) => candidate === value);

export interface IProfile {
  userId: string;
  role: Role;
  contact: string;
  consentFaceQr: boolean;
  createdAt?: Date;
}

export interface Profile {
  id: string;
  role: Role;
  contact: string;
  consentFaceQr: boolean;
  createdAt: Date;
}

export type ProfileUpdate = Partial<Pick<Profile, "contact" | "consentFaceQr" | "role">>;

const profileSchema = new mongoose.Schema<IProfile>(
  {
    userId: {
      type: String,
      required: true,
      unique: true,
    },
    role: {
      type: String,
      enum: ROLES,
      default: "VOLUNTEER",
    },
    contact: {
      type: String,
      required: true,
    },
    consentFaceQr: {
      type: Boolean,
      default: false,
    },
  },
  { timestamps: true }
);

const profileModel = mongoose.model<IProfile>("profiles", profileSchema);

export default profileModel;

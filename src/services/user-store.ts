import mongoose, { HydratedDocument } from "mongoose";
import userModel, { IUser } from "../models/user_model";
import profileModel, { IProfile, Profile, ProfileUpdate } from "../models/profile_model";
import { ConflictError } from "../utils/errors";

export interface UserAccount {
  id: string;
  contact: string;
  passwordHash: string;
  refreshTokens: string[];
}

export interface UserStore {
  findByContact(contact: string): Promise<UserAccount | null>;
  findById(id: string): Promise<UserAccount | null>;
  create(account: { contact: string; passwordHash: string }): Promise<UserAccount>;
  setRefreshTokens(id: string, tokens: string[]): Promise<void>;
  /** Changes the login contact; throws ConflictError when another account holds it. */
  setContact(id: string, contact: string): Promise<void>;
  createProfile(profile: Omit<Profile, "createdAt">): Promise<Profile>;
  findProfile(userId: string): Promise<Profile | null>;
  updateProfile(userId: string, fields: ProfileUpdate): Promise<Profile | null>;
}

export const toAccount = (doc: HydratedDocument<IUser>): UserAccount => ({
  id: doc._id.toString(),
  contact: doc.contact,
  passwordHash: doc.password,
  refreshTokens: [...doc.refreshToken],
});

export const toProfile = (doc: HydratedDocument<IProfile>): Profile => ({
  id: doc.userId,
  role: doc.role,
  contact: doc.contact,
  consentFaceQr: doc.consentFaceQr,
  createdAt: doc.createdAt ?? new Date(),
});

export class MongoUserStore implements UserStore {
  async findByContact(contact: string): Promise<UserAccount | null> {
    const doc = await userModel.findOne({ contact });
    return doc ? toAccount(doc) : null;
  }

  async findById(id: string): Promise<UserAccount | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const doc = await userModel.findById(id);
    return doc ? toAccount(doc) : null;
  }

  async create(account: { contact: string; passwordHash: string }): Promise<UserAccount> {
    try {
      const doc = await userModel.create({
        contact: account.contact,
        password: account.passwordHash,
        refreshToken: [],
      });
      return toAccount(doc);
    } catch (error) {
      if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
        throw new ConflictError("Contact already registered");
      }
      throw error;
    }
  }

  async setRefreshTokens(id: string, tokens: string[]): Promise<void> {
    await userModel.updateOne({ _id: id }, { refreshToken: tokens });
  }

  async setContact(id: string, contact: string): Promise<void> {
    try {
      await userModel.updateOne({ _id: id }, { contact });
    } catch (error) {
      if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
        throw new ConflictError("Contact already registered");
      }
      throw error;
    }
  }

  async createProfile(profile: Omit<Profile, "createdAt">): Promise<Profile> {
    const doc = await profileModel.create({
      userId: profile.id,
      role: profile.role,
      contact: profile.contact,
      consentFaceQr: profile.consentFaceQr,
    });
    return toProfile(doc);
  }

  async findProfile(userId: string): Promise<Profile | null> {
    const doc = await profileModel.findOne({ userId });
    return doc ? toProfile(doc) : null;
  }

  async updateProfile(userId: string, fields: ProfileUpdate): Promise<Profile | null> {
    const doc = await profileModel.findOneAndUpdate({ userId }, fields, { new: true });
    return doc ? toProfile(doc) : null;
  }
}

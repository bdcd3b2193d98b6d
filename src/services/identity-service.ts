import { randomUUID } from "crypto";
import bcrypt from "bcrypt";
import jwt, { JwtPayload, TokenExpiredError } from "jsonwebtoken";
import { Profile, ProfileUpdate, Role, isRole } from "../models/profile_model";
import { normalizeContact } from "../utils/config";
import { AuthError, ConflictError, NotFoundError, ValidationError } from "../utils/errors";
import { UserStore } from "./user-store";

export interface Identity {
  userId: string;
}

/** An authenticated caller together with the role from their profile. */
export interface Actor extends Identity {
  role: Role;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  userId: string;
}

export interface IdentityOptions {
  tokenSecret: string;
  tokenExpiration: number;
  refreshTokenExpiration: number;
  saltRounds: number;
  adminContacts: string[];
}

export interface RegisterInput {
  contact?: unknown;
  password?: unknown;
  role?: unknown;
  consentFaceQr?: unknown;
}

type TokenKind = "access" | "refresh";

const MIN_PASSWORD_LENGTH = 6;

/** Accepts real booleans and the "true"/"false" strings HTML forms send. */
export const parseBoolean = (value: unknown, field: string): boolean | undefined => {
  if (value === undefined) return undefined;
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new ValidationError(`${field} must be a boolean`);
};

export class IdentityService {
  constructor(
    private readonly store: UserStore,
    private readonly options: IdentityOptions
  ) {}

  async register(input: RegisterInput): Promise<Profile> {
    if (typeof input.contact !== "string" || !input.contact.trim()) {
      throw new ValidationError("Missing required field: contact");
    }
    if (typeof input.password !== "string" || input.password.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    if (input.role !== undefined && !isRole(input.role)) {
      throw new ValidationError("Role must be 'VOLUNTEER' or 'ADMIN'");
    }
    const consentFaceQr = parseBoolean(input.consentFaceQr, "consentFaceQr") ?? false;

    const contact = normalizeContact(input.contact);
    const isAdminContact = this.options.adminContacts.includes(contact);
    if (input.role === "ADMIN" && !isAdminContact) {
      throw new AuthError("Only volunteers can self-register", 403);
    }

    if (await this.store.findByContact(contact)) {
      throw new ConflictError("Contact already registered");
    }

    const salt = await bcrypt.genSalt(this.options.saltRounds);
    const passwordHash = await bcrypt.hash(input.password, salt);
    const account = await this.store.create({ contact, passwordHash });

    console.log(`Registered user ${account.id}`);
    return this.store.createProfile({
      id: account.id,
      role: isAdminContact ? "ADMIN" : "VOLUNTEER",
      contact,
      consentFaceQr,
    });
  }

  async authenticate(credentials: { contact?: unknown; password?: unknown }): Promise<TokenPair> {
    if (typeof credentials.contact !== "string" || typeof credentials.password !== "string") {
      throw new AuthError("Incorrect contact or password");
    }
    const account = await this.store.findByContact(normalizeContact(credentials.contact));
    if (!account) {
      throw new AuthError("Incorrect contact or password");
    }
    const valid = await bcrypt.compare(credentials.password, account.passwordHash);
    if (!valid) {
      throw new AuthError("Incorrect contact or password");
    }

    const tokens = this.issueTokens(account.id);
    await this.store.setRefreshTokens(account.id, [...account.refreshTokens, tokens.refreshToken]);
    return tokens;
  }

  verify(token: string): Identity {
    return { userId: this.decode(token, "access") };
  }

  /**
   * Rotates a refresh token. A token that is valid but no longer on the
   * account means it was already used, so every session of the account is
   * revoked.
   */
  async refresh(refreshToken: unknown): Promise<TokenPair> {
    if (typeof refreshToken !== "string" || !refreshToken) {
      throw new ValidationError("refreshToken is required");
    }
    const account = await this.accountForRefreshToken(refreshToken);

    const tokens = this.issueTokens(account.id);
    await this.store.setRefreshTokens(account.id, [
      ...account.refreshTokens.filter((t) => t !== refreshToken),
      tokens.refreshToken,
    ]);
    return tokens;
  }

  async logout(refreshToken: unknown): Promise<void> {
    if (typeof refreshToken !== "string" || !refreshToken) {
      throw new ValidationError("refreshToken is required");
    }
    const account = await this.accountForRefreshToken(refreshToken);
    await this.store.setRefreshTokens(
      account.id,
      account.refreshTokens.filter((t) => t !== refreshToken)
    );
  }

  /** Creates a default profile for accounts that have none yet. */
  async getProfile(identity: Identity): Promise<Profile> {
    const account = await this.store.findById(identity.userId);
    if (!account) {
      throw new NotFoundError("User not found");
    }
    const profile = await this.store.findProfile(account.id);
    if (profile) return profile;

    return this.store.createProfile({
      id: account.id,
      role: this.options.adminContacts.includes(account.contact) ? "ADMIN" : "VOLUNTEER",
      contact: account.contact,
      consentFaceQr: false,
    });
  }

  async resolveActor(identity: Identity): Promise<Actor> {
    const profile = await this.getProfile(identity);
    return { userId: profile.id, role: profile.role };
  }

  async updateProfile(identity: Identity, fields: Record<string, unknown>): Promise<Profile> {
    if (fields.role !== undefined) {
      throw new AuthError("Role can only be changed by an administrator", 403);
    }

    const update: ProfileUpdate = {};
    if (fields.contact !== undefined) {
      if (typeof fields.contact !== "string" || !fields.contact.trim()) {
        throw new ValidationError("contact must be a non-empty string");
      }
      update.contact = normalizeContact(fields.contact);
    }
    const consentFaceQr = parseBoolean(fields.consentFaceQr, "consentFaceQr");
    if (consentFaceQr !== undefined) {
      update.consentFaceQr = consentFaceQr;
    }
    if (Object.keys(update).length === 0) {
      throw new ValidationError("No updatable fields provided");
    }

    await this.getProfile(identity);
    if (update.contact !== undefined) {
      const holder = await this.store.findByContact(update.contact);
      if (holder && holder.id !== identity.userId) {
        throw new ConflictError("Contact already registered");
      }
      await this.store.setContact(identity.userId, update.contact);
    }
    const updated = await this.store.updateProfile(identity.userId, update);
    if (!updated) {
      throw new NotFoundError("User not found");
    }
    return updated;
  }

  async setRole(actor: Actor, targetUserId: string, role: unknown): Promise<Profile> {
    if (actor.role !== "ADMIN") {
      throw new AuthError("Only administrators can change roles", 403);
    }
    if (!isRole(role)) {
      throw new ValidationError("Role must be 'VOLUNTEER' or 'ADMIN'");
    }
    await this.getProfile({ userId: targetUserId });
    const updated = await this.store.updateProfile(targetUserId, { role });
    if (!updated) {
      throw new NotFoundError("User not found");
    }
    console.log(`User ${actor.userId} set role of ${targetUserId} to ${role}`);
    return updated;
  }

  private async accountForRefreshToken(refreshToken: string) {
    const userId = this.decode(refreshToken, "refresh");
    const account = await this.store.findById(userId);
    if (!account) {
      throw new AuthError("Invalid refresh token");
    }
    if (!account.refreshTokens.includes(refreshToken)) {
      console.warn(`Refresh token reuse detected for user ${account.id}, revoking all sessions`);
      await this.store.setRefreshTokens(account.id, []);
      throw new AuthError("Invalid refresh token");
    }
    return account;
  }

  private issueTokens(userId: string): TokenPair {
    const { tokenSecret, tokenExpiration, refreshTokenExpiration } = this.options;
    const accessToken = jwt.sign({ _id: userId, typ: "access" }, tokenSecret, {
      expiresIn: tokenExpiration,
      jwtid: randomUUID(),
    });
    const refreshToken = jwt.sign({ _id: userId, typ: "refresh" }, tokenSecret, {
      expiresIn: refreshTokenExpiration,
      jwtid: randomUUID(),
    });
    return { accessToken, refreshToken, userId };
  }

  private decode(token: string, kind: TokenKind): string {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.options.tokenSecret);
    } catch (err) {
      if (err instanceof TokenExpiredError) {
        throw new AuthError("Token expired");
      }
      throw new AuthError("Invalid token");
    }
    if (typeof payload === "string") {
      throw new AuthError("Invalid token payload");
    }
    const userId: unknown = payload._id;
    const typ: unknown = payload.typ;
    if (typeof userId !== "string" || typ !== kind) {
      throw new AuthError("Invalid token payload");
    }
    return userId;
  }
}

/** @format */

import { Express } from "express";
import request from "supertest";
import { Match, MatchStatus, NewMatch } from "../models/match_model";
import { NewNotification, Notification } from "../models/notification_model";
import { Profile, ProfileUpdate } from "../models/profile_model";
import { NewReport, Report, ReportFilter, ReportStatus, ReportType } from "../models/report_model";
import { RealtimeConnection } from "../services/connection-registry";
import { AppServices, Stores, createServices } from "../services/container";
import { MatchStore } from "../services/match-store";
import { NotificationStore } from "../services/notification-store";
import { ImageUpload, ObjectStore } from "../services/object-store";
import { ReportStore } from "../services/report-store";
import { Transcriber } from "../services/transcription-service";
import { UserAccount, UserStore } from "../services/user-store";
import { createApp } from "../server";
import { AppConfig } from "../utils/config";
import { ConflictError, NotFoundError, StorageError } from "../utils/errors";

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  port: 3000,
  corsOrigins: ["http://localhost:3000"],
  imageBucket: "report_photos",
  tokenSecret: "test-secret",
  tokenExpiration: 3600,
  refreshTokenExpiration: 604800,
  saltRounds: 4,
  adminContacts: ["admin@test.com"],
  geminiModel: "gemini-1.5-flash",
  wsHeartbeatInterval: 30000,
  ...overrides,
});

/** Timestamps strictly increase so "newest first" orderings are deterministic. */
let clock = Date.UTC(2024, 0, 1);
const nextDate = () => new Date((clock += 1000));

export class InMemoryUserStore implements UserStore {
  accounts = new Map<string, UserAccount>();
  profiles = new Map<string, Profile>();
  private seq = 0;

  async findByContact(contact: string) {
    return [...this.accounts.values()].find((a) => a.contact === contact) ?? null;
  }

  async findById(id: string) {
    return this.accounts.get(id) ?? null;
  }

  async create(account: { contact: string; passwordHash: string }) {
    if (await this.findByContact(account.contact)) {
      throw new ConflictError("Contact already registered");
    }
    const created: UserAccount = { id: `user-${++this.seq}`, ...account, refreshTokens: [] };
    this.accounts.set(created.id, created);
    return created;
  }

  async setRefreshTokens(id: string, tokens: string[]) {
    const account = this.accounts.get(id);
    if (account) account.refreshTokens = [...tokens];
  }

  async setContact(id: string, contact: string) {
    const holder = [...this.accounts.values()].find((a) => a.contact === contact);
    if (holder && holder.id !== id) {
      throw new ConflictError("Contact already registered");
    }
    const account = this.accounts.get(id);
    if (account) account.contact = contact;
  }

  async createProfile(profile: Omit<Profile, "createdAt">) {
    const created: Profile = { ...profile, createdAt: nextDate() };
    this.profiles.set(profile.id, created);
    return created;
  }

  async findProfile(userId: string) {
    return this.profiles.get(userId) ?? null;
  }

  async updateProfile(userId: string, fields: ProfileUpdate) {
    const profile = this.profiles.get(userId);
    if (!profile) return null;
    const updated = { ...profile, ...fields };
    this.profiles.set(userId, updated);
    return updated;
  }
}

export class InMemoryReportStore implements ReportStore {
  reports = new Map<string, Report>();
  failNextInsert = false;
  private seq = 0;

  async createReport(type: ReportType, payload: NewReport) {
    if (this.failNextInsert) {
      this.failNextInsert = false;
      throw new Error("insert failed");
    }
    const report: Report = { ...payload, id: `report-${++this.seq}`, type, status: "OPEN", createdAt: nextDate() };
    this.reports.set(report.id, report);
    return report;
  }

  async getReport(id: string) {
    const report = this.reports.get(id);
    if (!report) throw new NotFoundError("Report not found");
    return report;
  }

  async listReports(filter: ReportFilter) {
    return [...this.reports.values()]
      .filter((r) => (!filter.type || r.type === filter.type) && (!filter.status || r.status === filter.status))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async updateStatus(id: string, status: ReportStatus) {
    const report = await this.getReport(id);
    const updated = { ...report, status };
    this.reports.set(id, updated);
    return updated;
  }
}

export class InMemoryMatchStore implements MatchStore {
  matches = new Map<string, Match>();
  private seq = 0;

  /** Check and write happen without an await in between, like a unique index. */
  async createMatch(match: NewMatch) {
    if (this.pairTaken(match.lostReportId, match.foundReportId)) {
      throw new ConflictError("A match for these reports already exists");
    }
    const now = nextDate();
    const created: Match = { ...match, id: `match-${++this.seq}`, status: "PENDING", createdAt: now, updatedAt: now };
    this.matches.set(created.id, created);
    return created;
  }

  async getMatch(id: string) {
    const match = this.matches.get(id);
    if (!match) throw new NotFoundError("Match not found");
    return match;
  }

  async findMatchForPair(lostReportId: string, foundReportId: string) {
    return this.pairTaken(lostReportId, foundReportId) ?? null;
  }

  private pairTaken(lostReportId: string, foundReportId: string) {
    return [...this.matches.values()].find((m) => m.lostReportId === lostReportId && m.foundReportId === foundReportId);
  }

  async getMatchesForReport(reportId: string) {
    return [...this.matches.values()]
      .filter((m) => m.lostReportId === reportId || m.foundReportId === reportId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async listMatches(status?: MatchStatus) {
    return [...this.matches.values()]
      .filter((m) => !status || m.status === status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async setMatchStatus(id: string, status: MatchStatus, from: MatchStatus) {
    const match = this.matches.get(id);
    if (!match) throw new NotFoundError("Match not found");
    if (match.status !== from) return null;
    const updated = { ...match, status, updatedAt: nextDate() };
    this.matches.set(id, updated);
    return updated;
  }
}

export class InMemoryNotificationStore implements NotificationStore {
  notifications = new Map<string, Notification>();
  private seq = 0;

  async create(notification: NewNotification) {
    const created: Notification = {
      ...notification,
      id: `notification-${++this.seq}`,
      isRead: false,
      createdAt: nextDate(),
    };
    this.notifications.set(created.id, created);
    return created;
  }

  async findById(id: string) {
    return this.notifications.get(id) ?? null;
  }

  async listForUser(userId: string, options: { unreadOnly: boolean }) {
    return [...this.notifications.values()]
      .filter((n) => n.userId === userId && (!options.unreadOnly || !n.isRead))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async markRead(id: string) {
    const notification = this.notifications.get(id);
    if (!notification) return null;
    const updated = { ...notification, isRead: true };
    this.notifications.set(id, updated);
    return updated;
  }
}

export class FakeObjectStore implements ObjectStore {
  stored = new Map<string, ImageUpload>();
  removed: string[] = [];
  /** Number of uploads that succeed before every further upload fails. */
  failAfter: number | null = null;
  private seq = 0;

  async putImage(upload: ImageUpload) {
    if (this.failAfter !== null && this.stored.size >= this.failAfter) {
      throw new StorageError("Failed to upload image: bucket unavailable");
    }
    const url = `https://storage.test/report_photos/${upload.folder}/photo-${++this.seq}.jpg`;
    this.stored.set(url, upload);
    return url;
  }

  async removeImage(url: string) {
    this.stored.delete(url);
    this.removed.push(url);
  }
}

export class FakeTranscriber implements Transcriber {
  calls: { size: number; mimeType: string }[] = [];

  constructor(private readonly text: string | null) {}

  async transcribe(audio: Buffer, mimeType: string) {
    this.calls.push({ size: audio.length, mimeType });
    return this.text;
  }
}

/** A connection that records what it was sent. */
export class FakeConnection implements RealtimeConnection {
  readyState = 1;
  sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;
  failSends = false;

  send(data: string, cb?: (err?: Error) => void) {
    if (this.failSends) {
      throw new Error("socket write failed");
    }
    this.sent.push(data);
    cb?.();
  }

  close(code?: number, reason?: string) {
    this.closedWith = { code, reason };
    this.readyState = 3;
  }
}

export interface TestContext {
  app: Express;
  services: AppServices;
  stores: {
    users: InMemoryUserStore;
    reports: InMemoryReportStore;
    matches: InMemoryMatchStore;
    notifications: InMemoryNotificationStore;
    objects: FakeObjectStore;
  };
}

export const buildTestApp = (
  options: { transcriber?: Transcriber | null; config?: Partial<AppConfig> } = {}
): TestContext => {
  const stores = {
    users: new InMemoryUserStore(),
    reports: new InMemoryReportStore(),
    matches: new InMemoryMatchStore(),
    notifications: new InMemoryNotificationStore(),
    objects: new FakeObjectStore(),
  } satisfies Stores;
  const services = createServices(testConfig(options.config), stores, options.transcriber ?? null);
  return { app: createApp(services), services, stores };
};

export interface TestUser {
  userId: string;
  accessToken: string;
  refreshToken: string;
}

export const registerAndLogin = async (app: Express, contact: string, password = "123456"): Promise<TestUser> => {
  const registered = await request(app).post("/auth/register").send({ contact, password });
  if (registered.statusCode !== 201) {
    throw new Error(`register failed: ${registered.statusCode} ${registered.text}`);
  }
  const response = await request(app).post("/auth/token").send({ contact, password });
  if (response.statusCode !== 200) {
    throw new Error(`login failed: ${response.statusCode} ${response.text}`);
  }
  return {
    userId: response.body.userId,
    accessToken: response.body.accessToken,
    refreshToken: response.body.refreshToken,
  };
};

export const silenceConsole = () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });
};

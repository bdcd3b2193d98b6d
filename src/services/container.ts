import { AppConfig } from "../utils/config";
import { ConnectionRegistry } from "./connection-registry";
import { IdentityService } from "./identity-service";
import { MatchService } from "./match-service";
import { MatchStore } from "./match-store";
import { NotificationService } from "./notification-service";
import { NotificationStore } from "./notification-store";
import { ObjectStore } from "./object-store";
import { ReportService } from "./report-service";
import { ReportStore } from "./report-store";
import { Transcriber } from "./transcription-service";
import { UserStore } from "./user-store";

export interface Stores {
  users: UserStore;
  reports: ReportStore;
  matches: MatchStore;
  notifications: NotificationStore;
  objects: ObjectStore;
}

export interface AppServices {
  config: AppConfig;
  registry: ConnectionRegistry;
  identity: IdentityService;
  reports: ReportService;
  matches: MatchService;
  notifications: NotificationService;
  transcriber: Transcriber | null;
}

export const createServices = (
  config: AppConfig,
  stores: Stores,
  transcriber: Transcriber | null
): AppServices => {
  const registry = new ConnectionRegistry();
  const notifications = new NotificationService(registry, stores.notifications);
  const identity = new IdentityService(stores.users, {
    tokenSecret: config.tokenSecret,
    tokenExpiration: config.tokenExpiration,
    refreshTokenExpiration: config.refreshTokenExpiration,
    saltRounds: config.saltRounds,
    adminContacts: config.adminContacts,
  });

  return {
    config,
    registry,
    identity,
    reports: new ReportService(stores.reports, stores.objects, notifications, transcriber),
    matches: new MatchService(stores.matches, stores.reports, notifications),
    notifications,
    transcriber,
  };
};

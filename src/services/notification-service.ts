import { Notification } from "../models/notification_model";
import { AuthError, NotFoundError, ValidationError } from "../utils/errors";
import { ConnectionRegistry, RealtimeMessage } from "./connection-registry";
import { NotificationStore } from "./notification-store";

export interface InAppNotification {
  type: string;
  title: string;
  message: string;
  matchId?: string;
  reportId?: string;
  data?: Record<string, unknown>;
}

export interface MockNotificationInput {
  recipient: unknown;
  message: unknown;
  type: unknown;
  matchId?: unknown;
  reportId?: unknown;
}

const optionalId = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() ? value.trim() : undefined;

export class NotificationService {
  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly store: NotificationStore
  ) {}

  /**
   * Stores the notification for the user and pushes it to every open
   * connection they have. `realtime` is the message pushed on the socket.
   */
  async notifyUser(userId: string, notification: InAppNotification, realtime: RealtimeMessage): Promise<Notification> {
    const saved = await this.store.create({
      userId,
      channel: "IN_APP",
      type: notification.type,
      title: notification.title,
      message: notification.message,
      matchId: notification.matchId,
      reportId: notification.reportId,
      data: notification.data,
      status: "SENT",
    });
    this.registry.push(userId, { ...realtime, notificationId: saved.id });
    return saved;
  }

  broadcast(message: RealtimeMessage): number {
    return this.registry.broadcast(message);
  }

  /** Records an SMS or call as sent without contacting any carrier. */
  async sendMock(input: MockNotificationInput): Promise<Notification> {
    if (input.type !== "SMS" && input.type !== "CALL") {
      throw new ValidationError("type must be 'SMS' or 'CALL'");
    }
    if (typeof input.recipient !== "string" || !input.recipient.trim()) {
      throw new ValidationError("Missing required field: recipient");
    }
    if (typeof input.message !== "string" || !input.message.trim()) {
      throw new ValidationError("Missing required field: message");
    }

    const entry = await this.store.create({
      channel: input.type,
      type: "MOCK_ALERT",
      recipient: input.recipient.trim(),
      message: input.message,
      matchId: optionalId(input.matchId),
      reportId: optionalId(input.reportId),
      status: "SIMULATED_SENT",
    });
    console.log(`Simulated ${input.type} notification sent to ${entry.recipient}: ${entry.message}`);
    return entry;
  }

  listForUser(userId: string, unreadOnly: boolean): Promise<Notification[]> {
    return this.store.listForUser(userId, { unreadOnly });
  }

  async markRead(userId: string, notificationId: string): Promise<Notification> {
    const notification = await this.store.findById(notificationId);
    if (!notification) {
      throw new NotFoundError("Notification not found");
    }
    if (notification.userId !== userId) {
      throw new AuthError("Not authorized to update this notification", 403);
    }
    if (notification.isRead) return notification;
    const updated = await this.store.markRead(notificationId);
    if (!updated) {
      throw new NotFoundError("Notification not found");
    }
    return updated;
  }
}

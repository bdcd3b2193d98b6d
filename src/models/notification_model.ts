import mongoose from "mongoose";

export const NOTIFICATION_CHANNELS = ["IN_APP", "SMS", "CALL"] as const;
export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

export const NOTIFICATION_STATUSES = ["SENT", "SIMULATED_SENT", "FAILED"] as const;
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

export interface INotification {
  userId?: string;
  channel: NotificationChannel;
  type: string;
  title?: string;
  message: string;
  recipient?: string;
  matchId?: string;
  reportId?: string;
  data?: Record<string, unknown>;
  status: NotificationStatus;
  isRead: boolean;
  createdAt?: Date;
}

export interface Notification extends Omit<INotification, "createdAt"> {
  id: string;
  createdAt: Date;
}

export type NewNotification = Omit<INotification, "isRead" | "createdAt">;

const notificationSchema = new mongoose.Schema<INotification>({
  userId: { type: String, index: true },
  channel: { type: String, enum: NOTIFICATION_CHANNELS, required: true },
  type: { type: String, required: true },
  title: { type: String },
  message: { type: String, required: true },
  recipient: { type: String },
  matchId: { type: String },
  reportId: { type: String },
  data: { type: mongoose.Schema.Types.Mixed },
  status: { type: String, enum: NOTIFICATION_STATUSES, required: true },
  isRead: { type: Boolean, default: false },
  createdAt: { type: Date, default: Date.now },
});

const notificationModel = mongoose.model<INotification>("notifications", notificationSchema);

export default notificationModel;

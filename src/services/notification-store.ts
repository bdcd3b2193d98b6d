import mongoose, { HydratedDocument } from "mongoose";
import notificationModel, {
  INotification,
  NewNotification,
  Notification,
} from "../models/notification_model";

export interface NotificationStore {
  create(notification: NewNotification): Promise<Notification>;
  findById(id: string): Promise<Notification | null>;
  /** Newest first. */
  listForUser(userId: string, options: { unreadOnly: boolean }): Promise<Notification[]>;
  markRead(id: string): Promise<Notification | null>;
}

export const toNotification = (doc: HydratedDocument<INotification>): Notification => ({
  id: doc._id.toString(),
  userId: doc.userId,
  channel: doc.channel,
  type: doc.type,
  title: doc.title,
  message: doc.message,
  recipient: doc.recipient,
  matchId: doc.matchId,
  reportId: doc.reportId,
  data: doc.data,
  status: doc.status,
  isRead: doc.isRead,
  createdAt: doc.createdAt ?? new Date(),
});

export class MongoNotificationStore implements NotificationStore {
  async create(notification: NewNotification): Promise<Notification> {
    const doc = await notificationModel.create(notification);
    return toNotification(doc);
  }

  async findById(id: string): Promise<Notification | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const doc = await notificationModel.findById(id);
    return doc ? toNotification(doc) : null;
  }

  async listForUser(userId: string, options: { unreadOnly: boolean }): Promise<Notification[]> {
    const docs = await notificationModel
      .find(options.unreadOnly ? { userId, isRead: false } : { userId })
      .sort({ createdAt: -1 });
    return docs.map(toNotification);
  }

  async markRead(id: string): Promise<Notification | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const doc = await notificationModel.findByIdAndUpdate(id, { isRead: true }, { new: true });
    return doc ? toNotification(doc) : null;
  }
}

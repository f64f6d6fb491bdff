import { NotificationModel, INotification, NotificationStatus, RecipientType } from '../models/notification.model';
import { NotificationPreferenceModel, INotificationPreference } from '../models/notificationPreference.model';
import {
  INotificationPreferenceRepository,
  INotificationRepository,
  NotificationDraft,
  NotificationPatch,
  PreferenceDraft,
} from './types';
import { SessionRef } from './mongoSupport';

export class MongoNotificationRepository implements INotificationRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: NotificationDraft): Promise<INotification> {
    const [created] = await NotificationModel.create([draft], { session: this.session });
    return created.toObject();
  }

  public async findById(notificationId: string): Promise<INotification | null> {
    return NotificationModel.findOne({ notificationId }).session(this.session).lean<INotification>();
  }

  public async transition(
    notificationId: string,
    from: readonly NotificationStatus[],
    patch: NotificationPatch,
    increments: { deliveryAttempts?: number } = {}
  ): Promise<INotification | null> {
    return NotificationModel.findOneAndUpdate(
      { notificationId, status: { $in: [...from] } },
      increments.deliveryAttempts ? { $set: patch, $inc: increments } : { $set: patch },
      { new: true, session: this.session }
    ).lean<INotification>();
  }
}

export class MongoNotificationPreferenceRepository implements INotificationPreferenceRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async find(
    organizationId: string,
    recipientType: RecipientType,
    recipientId: string
  ): Promise<INotificationPreference | null> {
    return NotificationPreferenceModel.findOne({ organizationId, recipientType, recipientId })
      .session(this.session)
      .lean<INotificationPreference>();
  }

  public async upsert(draft: PreferenceDraft): Promise<INotificationPreference> {
    const { organizationId, recipientType, recipientId } = draft;
    const saved = await NotificationPreferenceModel.findOneAndUpdate(
      { organizationId, recipientType, recipientId },
      { $set: draft },
      { new: true, upsert: true, setDefaultsOnInsert: true, session: this.session }
    ).lean<INotificationPreference>();

    if (!saved) {
      throw new Error('PreferenceUpsertFailed');
    }
    return saved;
  }
}

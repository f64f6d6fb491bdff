import { Request, Response } from 'express';
import { body, param } from 'express-validator';
import { NOTIFICATION_CHANNELS, NOTIFICATION_TYPES } from '../models/notification.model';
import { ITypeOverride } from '../models/notificationPreference.model';
import { NotificationService } from '../services/notification.service';
import { authUserOf } from '../middleware/auth.middleware';
import { ResponseBuilder } from '../utils/response-builder';
import { rejectInvalidRequest } from '../utils/validation';

const RECIPIENT_TYPES = ['customer', 'contact'];
const PRIORITIES = ['low', 'normal', 'high'];
const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

// --- Validation Middleware ---

export const sendNotificationValidation = [
  body('channel').isIn([...NOTIFICATION_CHANNELS]).withMessage('Invalid channel.'),
  body('recipientType').isIn(RECIPIENT_TYPES).withMessage('Recipient type must be customer or contact.'),
  body('recipientId').optional().isString().withMessage('Recipient ID must be a string.'),
  body('recipientEmail').optional().isEmail().withMessage('Recipient email must be valid.'),
  body('recipientPhone').optional().isString().withMessage('Recipient phone must be a string.'),
  body('recipientPushToken').optional().isString().withMessage('Push token must be a string.'),
  body('notificationType').optional().isIn([...NOTIFICATION_TYPES]).withMessage('Invalid notification type.'),
  body('subject').optional().isString().isLength({ max: 200 }).withMessage('Subject max 200 chars.'),
  body('message').isString().trim().isLength({ min: 1, max: 2000 }).withMessage('Message is required (max 2000 chars).'),
  body('priority').optional().isIn(PRIORITIES).withMessage('Priority must be low, normal or high.'),
  body('scheduledFor').optional().isISO8601().toDate().withMessage('scheduledFor must be a valid ISO 8601 date.'),
  body('paymentId').optional().isString(),
  body('invoiceId').optional().isString(),
];

export const bulkSendValidation = [
  body('customerIds').isArray({ min: 1, max: 1000 }).withMessage('Between 1 and 1000 customer IDs are required.'),
  body('customerIds.*').isString().notEmpty().withMessage('Customer IDs must be strings.'),
  body('channel').isIn([...NOTIFICATION_CHANNELS]).withMessage('Invalid channel.'),
  body('notificationType').optional().isIn([...NOTIFICATION_TYPES]).withMessage('Invalid notification type.'),
  body('subject').optional().isString().isLength({ max: 200 }).withMessage('Subject max 200 chars.'),
  body('message').isString().trim().isLength({ min: 1, max: 2000 }).withMessage('Message is required (max 2000 chars).'),
  body('priority').optional().isIn(PRIORITIES).withMessage('Priority must be low, normal or high.'),
  body('scheduledFor').optional().isISO8601().toDate().withMessage('scheduledFor must be a valid ISO 8601 date.'),
];

export const markReadValidation = [
  param('notificationId').isString().notEmpty().withMessage('Notification ID is required.'),
];

export const resendValidation = [
  param('notificationId').isString().notEmpty().withMessage('Notification ID is required.'),
];

export const updatePreferencesValidation = [
  param('recipientType').isIn(RECIPIENT_TYPES).withMessage('Recipient type must be customer or contact.'),
  param('recipientId').isString().notEmpty().withMessage('Recipient ID is required.'),
  body(['receiveSms', 'receiveEmail', 'receiveWhatsapp', 'receivePush', 'receiveInApp'])
    .optional()
    .isBoolean({ strict: true })
    .withMessage('Channel switches must be booleans.'),
  body('typeOverrides').optional().isArray().withMessage('Type overrides must be an array.'),
  body('typeOverrides.*.notificationType').isIn([...NOTIFICATION_TYPES]).withMessage('Invalid notification type.'),
  body('typeOverrides.*.enabled').isBoolean({ strict: true }).withMessage('Override enabled must be a boolean.'),
  body(['quietHoursStart', 'quietHoursEnd'])
    .optional({ values: 'null' })
    .matches(TIME_OF_DAY)
    .withMessage('Quiet hours must be HH:mm.'),
];

export function createNotificationController(notifications: NotificationService) {
  /** Queues one notification. POST /notifications */
  const sendNotificationController = async (req: Request, res: Response): Promise<void> => {
    // 1. Input Validation
    if (rejectInvalidRequest(req, res)) return;

    try {
      // 2. Service Call: persists and queues the dispatch job
      const notification = await notifications.send(authUserOf(req).orgId, {
        channel: req.body.channel,
        recipientType: req.body.recipientType,
        recipientId: req.body.recipientId,
        recipientEmail: req.body.recipientEmail,
        recipientPhone: req.body.recipientPhone,
        recipientPushToken: req.body.recipientPushToken,
        notificationType: req.body.notificationType,
        subject: req.body.subject,
        message: req.body.message,
        priority: req.body.priority,
        scheduledFor: req.body.scheduledFor,
        paymentId: req.body.paymentId,
        invoiceId: req.body.invoiceId,
      });

      // 3. Success (202 Accepted - delivery happens in the worker)
      ResponseBuilder.success(
        res,
        {
          notificationId: notification.notificationId,
          status: notification.status,
          channel: notification.channel,
          scheduledFor: notification.scheduledFor ?? null,
        },
        202
      );
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to queue notification.');
    }
  };

  /** POST /notifications/bulk */
  const bulkSendController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const result = await notifications.sendBulk(authUserOf(req).orgId, {
        customerIds: req.body.customerIds,
        channel: req.body.channel,
        notificationType: req.body.notificationType,
        subject: req.body.subject,
        message: req.body.message,
        priority: req.body.priority,
        scheduledFor: req.body.scheduledFor,
      });

      ResponseBuilder.success(res, result, 202);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to queue bulk notifications.');
    }
  };

  /** POST /notifications/:notificationId/read */
  const markReadController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const notification = await notifications.markRead(authUserOf(req).orgId, req.params.notificationId);
      ResponseBuilder.success(res, notification);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to mark notification as read.');
    }
  };

  /** Requeues a failed notification. POST /notifications/:notificationId/resend */
  const resendController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const notification = await notifications.resend(authUserOf(req).orgId, req.params.notificationId);
      ResponseBuilder.success(res, notification, 202);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to resend notification.');
    }
  };

  /** PUT /notification-preferences/:recipientType/:recipientId */
  const updatePreferencesController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const typeOverrides: ITypeOverride[] | undefined = Array.isArray(req.body.typeOverrides)
        ? req.body.typeOverrides.map((override: ITypeOverride) => ({
            notificationType: override.notificationType,
            enabled: override.enabled,
          }))
        : undefined;

      const preference = await notifications.updatePreferences(
        authUserOf(req).orgId,
        req.params.recipientType === 'contact' ? 'contact' : 'customer',
        req.params.recipientId,
        {
          receiveSms: req.body.receiveSms,
          receiveEmail: req.body.receiveEmail,
          receiveWhatsapp: req.body.receiveWhatsapp,
          receivePush: req.body.receivePush,
          receiveInApp: req.body.receiveInApp,
          typeOverrides,
          quietHoursStart: req.body.quietHoursStart,
          quietHoursEnd: req.body.quietHoursEnd,
        }
      );

      ResponseBuilder.success(res, preference);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to update notification preferences.');
    }
  };

  return {
    sendNotificationController,
    bulkSendController,
    markReadController,
    resendController,
    updatePreferencesController,
  };
}

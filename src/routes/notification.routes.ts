import { Router } from 'express';
import {
  bulkSendValidation,
  createNotificationController,
  markReadValidation,
  resendValidation,
  sendNotificationValidation,
  updatePreferencesValidation,
} from '../controllers/notification.controller';
import { NotificationService } from '../services/notification.service';
import { authenticate } from '../middleware/auth.middleware';
import { authorize } from '../middleware/rbac.middleware';
import { PERMISSIONS } from '../config/permissions';

export function createNotificationRouter(notifications: NotificationService): Router {
  const router = Router();
  const controller = createNotificationController(notifications);
  const sendAccess = [PERMISSIONS.NOTIFICATION_SEND];

  // POST /notifications - Queue one notification
  router.post('/', authenticate, authorize(sendAccess), sendNotificationValidation, controller.sendNotificationController);

  // POST /notifications/bulk - One notification per customer id
  router.post('/bulk', authenticate, authorize(sendAccess), bulkSendValidation, controller.bulkSendController);

  // POST /notifications/:notificationId/read - In-app inbox
  router.post('/:notificationId/read', authenticate, authorize(sendAccess), markReadValidation, controller.markReadController);

  // POST /notifications/:notificationId/resend - Failed notifications only
  router.post('/:notificationId/resend', authenticate, authorize(sendAccess), resendValidation, controller.resendController);

  return router;
}

export function createNotificationPreferenceRouter(notifications: NotificationService): Router {
  const router = Router();
  const controller = createNotificationController(notifications);

  // PUT /notification-preferences/:recipientType/:recipientId
  router.put(
    '/:recipientType/:recipientId',
    authenticate,
    authorize([PERMISSIONS.NOTIFICATION_SEND]),
    updatePreferencesValidation,
    controller.updatePreferencesController
  );

  return router;
}

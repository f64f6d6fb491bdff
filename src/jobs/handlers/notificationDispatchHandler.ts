// src/jobs/handlers/notificationDispatchHandler.ts
import { IJob } from '../../models/job.model';
import { DispatchOutcome, NotificationService } from '../../services/notification.service';

/**
 * Worker logic for the 'notification.dispatch' job type. Delivery failures are
 * handled by the dispatcher and end the job successfully; only unexpected errors
 * reach the job-level retry policy.
 */
export function createNotificationDispatchHandler(notifications: NotificationService) {
    return async function handleNotificationDispatchJob(job: IJob): Promise<DispatchOutcome> {
        const { notificationId } = job.payload;

        if (typeof notificationId !== 'string' || !notificationId) {
            throw new Error('JobDataMissing: Missing notificationId.');
        }

        return notifications.process(notificationId);
    };
}

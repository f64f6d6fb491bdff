import mongoose from 'mongoose';
import { IRepositories, IUnitOfWork } from './types';
import { SessionRef } from './mongoSupport';
import { MongoOrganizationRepository } from './organization.repository';
import { MongoCustomerRepository } from './customer.repository';
import { MongoIntegrationRepository } from './integration.repository';
import { MongoPaymentRepository } from './payment.repository';
import { MongoInvoiceRepository } from './invoice.repository';
import { MongoPaymentPlanRepository } from './paymentPlan.repository';
import { MongoNotificationPreferenceRepository, MongoNotificationRepository } from './notification.repository';
import { MongoApiLogRepository } from './apiLog.repository';
import { MongoReferenceCounterRepository } from './counter.repository';
import { MongoJobRepository } from './job.repository';

export function createMongoRepositories(session: SessionRef = null): IRepositories {
  return {
    organizations: new MongoOrganizationRepository(session),
    customers: new MongoCustomerRepository(session),
    integrations: new MongoIntegrationRepository(session),
    payments: new MongoPaymentRepository(session),
    invoices: new MongoInvoiceRepository(session),
    paymentPlans: new MongoPaymentPlanRepository(session),
    notifications: new MongoNotificationRepository(session),
    notificationPreferences: new MongoNotificationPreferenceRepository(session),
    apiLogs: new MongoApiLogRepository(session),
    counters: new MongoReferenceCounterRepository(session),
    jobs: new MongoJobRepository(session),
  };
}

/**
 * Transactions over a replica set. `withTransaction` re-runs the callback on
 * transient errors (write conflicts included), so `work` must be safe to repeat.
 */
export class MongoUnitOfWork implements IUnitOfWork {
  public readonly repos = createMongoRepositories();

  public async run<T>(work: (repos: IRepositories) => Promise<T>): Promise<T> {
    const session = await mongoose.startSession();
    const outcomes: T[] = [];
    try {
      await session.withTransaction(async () => {
        outcomes.length = 0;
        outcomes.push(await work(createMongoRepositories(session)));
      });
    } finally {
      await session.endSession();
    }

    if (outcomes.length === 0) {
      throw new Error('TransactionAborted');
    }
    return outcomes[0];
  }
}

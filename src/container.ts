// src/container.ts
import { IUnitOfWork } from './repositories/types';
import { ProviderResolver } from './providerAdapters/adapter.factory';
import { IChannelAdapters } from './notificationAdapters/channelSenders';
import { JobService } from './services/job.service';
import { ReferenceService } from './services/reference.service';
import { CustomerService } from './services/customer.service';
import { NotificationService } from './services/notification.service';
import { LedgerService } from './services/ledger.service';
import { PaymentService } from './services/payment.service';
import { JOB_TYPES, JobType } from './jobs/jobRegistry';
import { JobHandler } from './jobs/worker';
import { createNotificationDispatchHandler } from './jobs/handlers/notificationDispatchHandler';
import { createOverdueSweepHandler } from './jobs/handlers/overdueSweepHandler';

export interface IServiceOptions {
  resolveProvider: ProviderResolver;
  channelAdapters: IChannelAdapters;
  publicBaseUrl: string;
  now?: () => Date;
}

export interface IServices {
  uow: IUnitOfWork;
  jobs: JobService;
  customers: CustomerService;
  notifications: NotificationService;
  ledger: LedgerService;
  payments: PaymentService;
  jobHandlers: Record<JobType, JobHandler>;
}

/** Wires every service over one unit of work. */
export function createServices(uow: IUnitOfWork, options: IServiceOptions): IServices {
  const now = options.now ?? (() => new Date());

  const jobs = new JobService(uow.repos);
  const references = new ReferenceService(now);
  const customers = new CustomerService(uow, references);
  const notifications = new NotificationService(uow, jobs, customers, options.channelAdapters);
  const ledger = new LedgerService(uow, references, customers, notifications, now);
  const payments = new PaymentService(uow, {
    references,
    customers,
    ledger,
    notifications,
    resolveProvider: options.resolveProvider,
    publicBaseUrl: options.publicBaseUrl,
    now,
  });

  return {
    uow,
    jobs,
    customers,
    notifications,
    ledger,
    payments,
    jobHandlers: {
      [JOB_TYPES.NOTIFICATION_DISPATCH]: createNotificationDispatchHandler(notifications),
      [JOB_TYPES.LEDGER_OVERDUE_SWEEP]: createOverdueSweepHandler(ledger),
    },
  };
}

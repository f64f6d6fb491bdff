import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { IServices } from './container';
import { createWebhookRouter } from './routes/webhook.routes';
import { createPaymentRouter } from './routes/payment.routes';
import { createCustomerRouter } from './routes/customer.routes';
import { createInvoiceRouter } from './routes/invoice.routes';
import { createPaymentPlanRouter } from './routes/paymentPlan.routes';
import { createNotificationPreferenceRouter, createNotificationRouter } from './routes/notification.routes';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';

export function createApp(services: IServices): Application {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());

  // Webhooks parse their own raw body, so they go before the JSON parser
  app.use('/webhooks', createWebhookRouter(services.payments));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/payments', createPaymentRouter(services.payments));
  app.use('/customers', createCustomerRouter(services.customers));
  app.use('/invoices', createInvoiceRouter(services.ledger));
  app.use('/payment-plans', createPaymentPlanRouter(services.ledger));
  app.use('/notifications', createNotificationRouter(services.notifications));
  app.use('/notification-preferences', createNotificationPreferenceRouter(services.notifications));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

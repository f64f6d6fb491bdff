// src/notificationAdapters/loggingTransport.ts
import {
  IEmailMessageDTO,
  IEmailTransport,
  IInboxMessageDTO,
  IInboxTransport,
  IPushMessageDTO,
  IPushTransport,
  ISmsTransport,
  ITextMessageDTO,
  ITransportReceipt,
  IWhatsAppTransport,
} from './channel.interface';
import { logger } from '../utils/logger';

/**
 * Default outbound transport until a gateway is configured: writes the message to
 * the log and reports it as sent under the notification's own id.
 */
export class LoggingTransport implements ISmsTransport, IWhatsAppTransport, IEmailTransport, IPushTransport {
  public providerName = 'log';

  public async sendSms(message: ITextMessageDTO): Promise<ITransportReceipt> {
    return this.write('sms', message.notificationId, message.to, message.body);
  }

  public async sendWhatsApp(message: ITextMessageDTO): Promise<ITransportReceipt> {
    return this.write('whatsapp', message.notificationId, message.to, message.body);
  }

  public async sendEmail(message: IEmailMessageDTO): Promise<ITransportReceipt> {
    return this.write('email', message.notificationId, message.to, `${message.subject}: ${message.body}`);
  }

  public async sendPush(message: IPushMessageDTO): Promise<ITransportReceipt> {
    return this.write('push', message.notificationId, message.token, `${message.title}: ${message.body}`);
  }

  private write(channel: string, notificationId: string, to: string, body: string): ITransportReceipt {
    logger.info('Outbound message', { channel, notificationId, to, length: body.length });
    return { providerMessageId: `log-${channel}-${notificationId}` };
  }
}

export class InboxTransport implements IInboxTransport {
  public providerName = 'inbox';

  public async deliver(message: IInboxMessageDTO): Promise<ITransportReceipt> {
    return { providerMessageId: `inbox-${message.notificationId}` };
  }
}

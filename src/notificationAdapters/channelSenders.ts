// src/notificationAdapters/channelSenders.ts
import { NotificationChannel } from '../models/notification.model';
import { IEmailTransport, IInboxTransport, IPushTransport, ISmsTransport, IWhatsAppTransport } from './channel.interface';
import { InboxTransport, LoggingTransport } from './loggingTransport';

/** One message ready for a transport, tagged by channel. */
export type OutboundMessage =
  | { channel: 'sms'; notificationId: string; to: string; body: string }
  | { channel: 'whatsapp'; notificationId: string; to: string; body: string }
  | { channel: 'email'; notificationId: string; to: string; subject: string; body: string }
  | { channel: 'push'; notificationId: string; token: string; title: string; body: string }
  | { channel: 'in_app'; notificationId: string; recipientId: string; title: string; body: string };

interface ChannelTransportMap {
  sms: ISmsTransport;
  email: IEmailTransport;
  whatsapp: IWhatsAppTransport;
  push: IPushTransport;
  in_app: IInboxTransport;
}

// Keyed by channel so adding a channel without a transport fails to compile
export type IChannelAdapters = {
  [C in NotificationChannel]: ChannelTransportMap[C];
};

export interface IDeliveryReceipt {
  providerMessageId: string;
  // true when the channel confirms delivery synchronously (in-app)
  delivered: boolean;
}

export function createDefaultChannelAdapters(): IChannelAdapters {
  const outbound = new LoggingTransport();
  return { sms: outbound, email: outbound, whatsapp: outbound, push: outbound, in_app: new InboxTransport() };
}

/**
 * Sends through the transport for the message's channel.
 * @throws {Error} - transport failures propagate to the dispatcher, which owns retries.
 */
export async function deliver(adapters: IChannelAdapters, message: OutboundMessage): Promise<IDeliveryReceipt> {
  switch (message.channel) {
    case 'sms': {
      const { providerMessageId } = await adapters.sms.sendSms(message);
      return { providerMessageId, delivered: false };
    }
    case 'whatsapp': {
      const { providerMessageId } = await adapters.whatsapp.sendWhatsApp(message);
      return { providerMessageId, delivered: false };
    }
    case 'email': {
      const { providerMessageId } = await adapters.email.sendEmail(message);
      return { providerMessageId, delivered: false };
    }
    case 'push': {
      const { providerMessageId } = await adapters.push.sendPush(message);
      return { providerMessageId, delivered: false };
    }
    case 'in_app': {
      const { providerMessageId } = await adapters.in_app.deliver(message);
      return { providerMessageId, delivered: true };
    }
    default: {
      const unreachable: never = message;
      throw new Error(`UnsupportedChannel: ${JSON.stringify(unreachable)}`);
    }
  }
}

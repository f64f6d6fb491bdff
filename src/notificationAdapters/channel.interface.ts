// src/notificationAdapters/channel.interface.ts
// Transport contracts per channel. Gateways (SMS aggregators, ESPs, push services)
// plug in behind these; a transport either returns its message id or throws.

export interface ITransportReceipt {
  providerMessageId: string;
}

export interface ITextMessageDTO {
  notificationId: string;
  to: string; // MSISDN, 2547XXXXXXXX
  body: string;
}

export interface IEmailMessageDTO {
  notificationId: string;
  to: string;
  subject: string;
  body: string;
}

export interface IPushMessageDTO {
  notificationId: string;
  token: string;
  title: string;
  body: string;
}

export interface IInboxMessageDTO {
  notificationId: string;
  recipientId: string;
  title: string;
  body: string;
}

export interface ISmsTransport {
  providerName: string;
  sendSms(message: ITextMessageDTO): Promise<ITransportReceipt>;
}

export interface IWhatsAppTransport {
  providerName: string;
  sendWhatsApp(message: ITextMessageDTO): Promise<ITransportReceipt>;
}

export interface IEmailTransport {
  providerName: string;
  sendEmail(message: IEmailMessageDTO): Promise<ITransportReceipt>;
}

export interface IPushTransport {
  providerName: string;
  sendPush(message: IPushMessageDTO): Promise<ITransportReceipt>;
}

/** In-app messages are the notification record itself; delivery is immediate. */
export interface IInboxTransport {
  providerName: string;
  deliver(message: IInboxMessageDTO): Promise<ITransportReceipt>;
}

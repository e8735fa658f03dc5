/**
 * Abstract factory: each notification channel provides a matching family of
 * sender and formatter.
 *
 * @module abstract-factory
 */

import { Result, createValidationError } from "@creational/errors";

import type { ValidationError } from "@creational/errors";
import type { BaseLogger } from "@creational/logger";

export const NOTIFICATION_CHANNELS = ["email", "sms"] as const;
export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

export interface Delivery {
  channel: NotificationChannel;
  /** The formatted message handed to the sender */
  message: string;
  /** What the sender emitted */
  line: string;
}

export interface MessageSender {
  send(message: string): Delivery;
}

export interface MessageFormatter {
  format(message: string): string;
}

export class EmailMessageSender implements MessageSender {
  send(message: string): Delivery {
    return { channel: "email", message, line: `EMAIL SENT: ${message}` };
  }
}

export class EmailMessageFormatter implements MessageFormatter {
  format(message: string): string {
    return `[EMAIL FORMAT] ${message}`;
  }
}

export class SmsMessageSender implements MessageSender {
  send(message: string): Delivery {
    return { channel: "sms", message, line: `SMS SENT: ${message}` };
  }
}

export class SmsMessageFormatter implements MessageFormatter {
  format(message: string): string {
    return `[SMS FORMAT] ${message}`;
  }
}

export interface NotificationFactory {
  createSender(): MessageSender;
  createFormatter(): MessageFormatter;
}

export class EmailNotificationFactory implements NotificationFactory {
  createSender(): MessageSender {
    return new EmailMessageSender();
  }

  createFormatter(): MessageFormatter {
    return new EmailMessageFormatter();
  }
}

export class SmsNotificationFactory implements NotificationFactory {
  createSender(): MessageSender {
    return new SmsMessageSender();
  }

  createFormatter(): MessageFormatter {
    return new SmsMessageFormatter();
  }
}

export interface NotificationAppOptions {
  /** Receives each sender line. Defaults to `console.log` */
  output?: (line: string) => void;
  logger?: BaseLogger;
}

/**
 * Client that only knows the factory; swapping the factory swaps the whole
 * family.
 */
export class NotificationApp {
  private readonly sender: MessageSender;
  private readonly formatter: MessageFormatter;
  private readonly output: (line: string) => void;
  private readonly logger: BaseLogger | undefined;

  constructor(factory: NotificationFactory, options: NotificationAppOptions = {}) {
    this.sender = factory.createSender();
    this.formatter = factory.createFormatter();
    this.output = options.output ?? ((line) => console.log(line));
    this.logger = options.logger;
  }

  notify(message: string): Delivery {
    const delivery = this.sender.send(this.formatter.format(message));
    this.output(delivery.line);
    this.logger?.debug("notification sent", {
      channel: delivery.channel,
      length: delivery.message.length,
    });
    return delivery;
  }
}

const notificationFactories: Record<
  NotificationChannel,
  () => NotificationFactory
> = {
  email: () => new EmailNotificationFactory(),
  sms: () => new SmsNotificationFactory(),
};

export const getNotificationFactory = (
  channel: NotificationChannel,
): NotificationFactory => notificationFactories[channel]();

const isNotificationChannel = (value: string): value is NotificationChannel =>
  NOTIFICATION_CHANNELS.some((channel) => channel === value);

export function parseNotificationChannel(
  input: string,
): Result<NotificationChannel, ValidationError> {
  const normalized = input.trim().toLowerCase();
  if (isNotificationChannel(normalized)) {
    return Result.ok(normalized);
  }
  return Result.err(
    createValidationError(`Unsupported notification type: ${input}`, {
      channel: [`must be one of ${NOTIFICATION_CHANNELS.join(", ")}`],
    }),
  );
}

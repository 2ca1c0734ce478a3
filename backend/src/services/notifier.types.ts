export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface NotificationMessage {
  title: string;
  description: string;
  /** Decimal RGB, as Discord expects. */
  color: number;
  fields: EmbedField[];
  footer: string;
}

export interface Notifier {
  /** Resolves true only when the webhook accepted the message. Never rejects. */
  send(message: NotificationMessage): Promise<boolean>;
}

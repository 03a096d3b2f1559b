/**
 * Failure notifications by email through Mailtrap. Disabled unless the
 * token, sender and recipient are all configured.
 */
import { MailtrapClient } from "mailtrap";
import type { AppEnv } from "@/lib/config";
import { errorMessage } from "@/lib/errors";

export type NotificationConfig =
  | { kind: "disabled" }
  | { kind: "mailtrap"; token: string; sender: string; recipient: string };

export interface OutgoingMail {
  from: { email: string; name?: string };
  to: Array<{ email: string }>;
  subject: string;
  text: string;
}

/** The slice of MailtrapClient the notifier uses. */
export interface MailSender {
  send(mail: OutgoingMail): Promise<unknown>;
}

export interface Notifier {
  /** Resolves true when the message was handed to the mail service. */
  notify(subject: string, body: string): Promise<boolean>;
}

const SENDER_NAME = "imotscope";

export function notificationConfigFromEnv(env: AppEnv): NotificationConfig {
  const { MAILTRAP_TOKEN, MAILTRAP_SENDER_EMAIL, MAILTRAP_SEND_TO_EMAIL } = env;
  if (!MAILTRAP_TOKEN || !MAILTRAP_SENDER_EMAIL || !MAILTRAP_SEND_TO_EMAIL) {
    return { kind: "disabled" };
  }
  return {
    kind: "mailtrap",
    token: MAILTRAP_TOKEN,
    sender: MAILTRAP_SENDER_EMAIL,
    recipient: MAILTRAP_SEND_TO_EMAIL,
  };
}

export function createNotifier(config: NotificationConfig, sender?: MailSender): Notifier {
  if (config.kind === "disabled") {
    return {
      async notify(subject) {
        console.log(`[notify] Email disabled, not sending "${subject}"`);
        return false;
      },
    };
  }

  const client: MailSender = sender ?? new MailtrapClient({ token: config.token });
  return {
    async notify(subject, body) {
      try {
        await client.send({
          from: { email: config.sender, name: SENDER_NAME },
          to: [{ email: config.recipient }],
          subject,
          text: body,
        });
        console.log(`[notify] Sent "${subject}" to ${config.recipient}`);
        return true;
      } catch (err) {
        console.error(`[notify] Failed to send "${subject}": ${errorMessage(err)}`);
        return false;
      }
    },
  };
}

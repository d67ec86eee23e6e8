import nodemailer from "nodemailer";
import type { EmailConfig } from "../../core/domain/entities/config.entity.js";
import type { RunSummary } from "../../core/domain/entities/run.entity.js";
import { describeScope } from "../../core/domain/services/date-scope.service.js";
import type { INotificationService } from "../../core/domain/services/notification.service.js";

export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
}

/** The part of a nodemailer transporter this service needs. */
export interface MailSender {
  sendMail(message: MailMessage): Promise<unknown>;
}

export class NodemailerNotificationService implements INotificationService {
  constructor(
    private readonly sender: MailSender,
    private readonly from: string,
    private readonly to: string[],
  ) {}

  static fromConfig(config: EmailConfig): NodemailerNotificationService {
    const transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: config.user
        ? { user: config.user, pass: config.password ?? "" }
        : undefined,
    });
    return new NodemailerNotificationService(transporter, config.from, config.to);
  }

  async notifyExhausted(summary: RunSummary): Promise<void> {
    await this.sender.sendMail({
      from: this.from,
      to: this.to,
      subject: `[pos-report-ingest] ${summary.remaining.length} store(s) not ingested for ${describeScope(summary.scope)}`,
      text: formatExhaustedBody(summary),
    });
  }
}

export function formatExhaustedBody(summary: RunSummary): string {
  return [
    `Run ${summary.runId} gave up after ${summary.attempts} attempt(s).`,
    `Scope: ${describeScope(summary.scope)}`,
    `Processed: ${summary.processed.length}/${summary.universe.length}`,
    "",
    "Stores still missing data:",
    ...summary.remaining.map((s) => `  - ${s}`),
    "",
    `Started:  ${summary.startedAt}`,
    `Finished: ${summary.finishedAt}`,
  ].join("\n");
}

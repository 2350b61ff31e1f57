import nodemailer from 'nodemailer';
import { EmailSettings } from '../interfaces/BackupConfig';
import { RunResult } from '../interfaces/BackupOrchestrator';
import { Logger } from '../interfaces/Logger';
import { EmailContent, Notifier } from '../interfaces/Notifier';
import { formatDuration, formatTimestamp } from '../utils/formatting';

const IMPLICIT_TLS_PORT = 465;
const SMTP_TIMEOUT_MS = 30000;

export class NotificationError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'NotificationError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Compose the status email. Output depends only on the arguments.
 */
export function composeReport(settings: EmailSettings, report: RunResult): EmailContent {
  const lines = [
    `Backup report for ${report.projectName}`,
    `Status: ${report.status}`,
    `Total size: ${report.totalSize ?? 'unknown'}`,
    `Duration: ${formatDuration(report.duration)}`,
    `Started: ${formatTimestamp(report.startedAt)}`,
    `Log file: ${report.logFilePath}`,
  ];

  if (report.failures.length > 0) {
    lines.push('', 'Failures:');
    for (const failure of report.failures) {
      lines.push(`- ${failure}`);
    }
  }

  return {
    subject: `${settings.subject} - ${report.projectName}: ${report.status}`,
    body: lines.join('\n'),
  };
}

/**
 * Sends the run report over SMTP. Delivery problems are logged, never thrown.
 */
export class EmailNotifier implements Notifier {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async notify(settings: EmailSettings | undefined, report: RunResult): Promise<void> {
    if (!settings) {
      this.logger.debug('No email settings configured, skipping notification');
      return;
    }

    try {
      const email = composeReport(settings, report);
      await this.send(settings, email);
      this.logger.info(`Notification sent to ${settings.to}`);
    } catch (error) {
      const notificationError = new NotificationError(
        `Failed to send notification email: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
      this.logger.error(notificationError.message, notificationError);
    }
  }

  private async send(settings: EmailSettings, email: EmailContent): Promise<void> {
    const implicitTls = settings.smtpPort === IMPLICIT_TLS_PORT;
    const transporter = nodemailer.createTransport({
      host: settings.smtpServer,
      port: settings.smtpPort,
      secure: implicitTls,
      requireTLS: !implicitTls,
      auth: {
        user: settings.smtpUser,
        pass: settings.smtpPassword,
      },
      connectionTimeout: SMTP_TIMEOUT_MS,
    });

    try {
      await transporter.sendMail({
        from: settings.from,
        to: settings.to,
        subject: email.subject,
        text: email.body,
      });
    } finally {
      transporter.close();
    }
  }
}

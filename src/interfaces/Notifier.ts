import { EmailSettings } from './BackupConfig';
import { RunResult } from './BackupOrchestrator';

export interface EmailContent {
  subject: string;
  body: string;
}

/**
 * Interface for run status notification. Implementations never throw.
 */
export interface Notifier {
  notify(settings: EmailSettings | undefined, report: RunResult): Promise<void>;
}

import { RetentionPolicy } from './BackupConfig';
import { CommandResult } from './CommandRunner';

/**
 * Interface for applying a retention policy to the repository
 */
export interface RetentionEnforcer {
  /**
   * Prune snapshots according to the policy
   * @returns null when there is no policy to apply
   */
  enforce(policy?: RetentionPolicy): Promise<CommandResult | null>;
}

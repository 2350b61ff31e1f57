import { RetentionPolicy } from '../interfaces/BackupConfig';
import { CommandResult, CommandRunner } from '../interfaces/CommandRunner';
import { RetentionEnforcer as IRetentionEnforcer } from '../interfaces/RetentionEnforcer';

/**
 * Applies the configured retention policy through the command runner
 */
export class RetentionEnforcer implements IRetentionEnforcer {
  private commandRunner: CommandRunner;

  constructor(commandRunner: CommandRunner) {
    this.commandRunner = commandRunner;
  }

  async enforce(policy?: RetentionPolicy): Promise<CommandResult | null> {
    if (!policy || !RetentionEnforcer.hasRules(policy)) {
      return null;
    }
    return this.commandRunner.forget(policy);
  }

  static hasRules(policy: RetentionPolicy): boolean {
    return Object.values(policy).some(value => value !== undefined);
  }
}

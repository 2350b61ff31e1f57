import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BackupOrchestrator } from '../src/clients/BackupOrchestrator';
import { Logger } from '../src/clients/Logger';
import { ConfigurationManager } from '../src/config/ConfigurationManager';
import { LogLevel } from '../src/interfaces/Logger';
import { formatCompactTimestamp } from '../src/utils/formatting';
import { createMockLogger } from './support/mockLogger';

// Stand-in for restic: records each subcommand and answers like a fresh repository
const FAKE_RESTIC = `#!/bin/sh
echo "$3" >> "$(dirname "$0")/calls.txt"
case "$3" in
  snapshots)
    echo "Fatal: repository does not exist: unable to open config file" >&2
    exit 10
    ;;
  init)
    echo "created restic repository with password $RESTIC_PASSWORD"
    ;;
  backup)
    echo "snapshot 1a2b3c4d saved"
    ;;
  stats)
    echo "     Total Size:  1.234 MiB"
    ;;
  forget)
    echo "Applying Policy: keep 7 daily snapshots"
    ;;
  *)
    exit 1
    ;;
esac
`;

const LINE_PREFIX = /^\d{4}-\d\d-\d\d \d\d:\d\d:\d\d \[(ERROR|WARN|INFO|DEBUG)\] nas: /;

const describeOnPosix = process.platform === 'win32' ? describe.skip : describe;

async function readWhenComplete(filePath: string): Promise<string> {
  for (let attempt = 0; attempt < 100; attempt++) {
    const content = await fs.readFile(filePath, 'utf8');
    if (content.includes('Backup run finished')) {
      return content;
    }
    await new Promise(resolve => setTimeout(resolve, 20));
  }
  return fs.readFile(filePath, 'utf8');
}

describeOnPosix('Backup run integration', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(join(tmpdir(), 'restic-backup-integration-'));
    const toolPath = join(testDir, 'restic');
    await fs.writeFile(toolPath, FAKE_RESTIC, { mode: 0o755 });

    configPath = join(testDir, 'backup-config.json');
    await ConfigurationManager.saveConfiguration(configPath, {
      projectName: 'nas',
      logPath: join(testDir, 'logs', 'nas'),
      backupSource: join(testDir, 'data'),
      backupToolPath: toolPath,
      repository: join(testDir, 'repo'),
      repositoryPassword: 'test-secret',
      useFilesystemSnapshot: false,
      retentionPolicy: { keepDaily: 7 },
    });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should run every step and write one redacted run log', async () => {
    const orchestrator = new BackupOrchestrator({
      consoleLogger: createMockLogger(),
      createLogger: (config, logFilePath) =>
        new Logger({
          projectName: config.projectName,
          level: LogLevel.DEBUG,
          logFilePath,
          silentConsole: true,
        }),
    });

    const result = await orchestrator.runBackup(configPath);

    expect(result.status).toBe('Success');
    expect(result.totalSize).toBe('1.234 MiB');
    expect(result.failures).toEqual([]);

    const calls = await fs.readFile(join(testDir, 'calls.txt'), 'utf8');
    expect(calls.trim().split('\n')).toEqual(['snapshots', 'init', 'backup', 'stats', 'forget']);

    const logFiles = await fs.readdir(join(testDir, 'logs'));
    expect(logFiles).toEqual([`nas-${formatCompactTimestamp(result.startedAt)}.log`]);
    expect(result.logFilePath).toBe(join(testDir, 'logs', logFiles[0]));

    const content = await readWhenComplete(result.logFilePath);
    const lines = content.split('\n').filter(line => line.length > 0);
    const entries = lines.filter(line => /^\d{4}-/.test(line));

    expect(lines[0]).toMatch(LINE_PREFIX);
    expect(entries.length).toBeGreaterThan(5);
    for (const entry of entries) {
      expect(entry).toMatch(LINE_PREFIX);
    }
    expect(content).toContain('created restic repository with password [REDACTED]');
    expect(content).toContain('nas: Applying retention policy: --prune --keep-daily 7');
    expect(content).toContain('[INFO] nas: Backup run finished with status Success');
    expect(content).not.toContain('test-secret');
    expect(process.env.RESTIC_PASSWORD).toBeUndefined();
  });
});

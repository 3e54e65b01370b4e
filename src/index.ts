import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { CronScheduler } from './clients/CronScheduler';
import { toError } from './clients/BackupErrors';
import { BackupComponents, createComponents, runBackup } from './handler';
import { BackupConfig } from './interfaces/BackupConfig';
import { Logger as ILogger } from './interfaces/Logger';

export { handler } from './handler';

const USAGE = 'Usage: s3-bucket-backup [backup | serve | restore <backup-key> | list [prefix] [bucket] | info <backup-key> [bucket]]';

export type ComponentFactory = (config: BackupConfig, logger: ILogger) => BackupComponents;

/**
 * Main application class that loads configuration and dispatches commands
 */
class BucketBackupApplication {
  private logger: ILogger;
  private config: BackupConfig | null = null;
  private components: BackupComponents | null = null;
  private cronScheduler: CronScheduler | null = null;
  private isShuttingDown = false;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly componentFactory: ComponentFactory = createComponents,
    logger?: ILogger
  ) {
    this.logger = logger ?? Logger.createFromEnvironment(env);
  }

  /**
   * Load configuration and build components
   */
  initialize(): void {
    this.config = ConfigurationManager.loadConfiguration(this.env);
    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(this.config));
    this.components = this.componentFactory(this.config, this.logger);
  }

  /**
   * Run a single command; resolves to the process exit code
   */
  async run(command: string, args: string[]): Promise<number> {
    try {
      this.initialize();
    } catch (error) {
      this.logger.error(
        error instanceof ConfigurationError ? 'Configuration error' : 'Failed to initialize application',
        toError(error)
      );
      return 1;
    }

    const components = this.requireComponents();

    switch (command) {
      case 'backup': {
        const response = await runBackup(components.backupManager, this.logger);
        console.log(JSON.stringify(response, null, 2));
        return response.statusCode === 200 ? 0 : 1;
      }
      case 'serve':
        return this.serve();
      case 'restore': {
        const [backupKey] = args;
        if (!backupKey) {
          console.error(USAGE);
          return 2;
        }
        const restored = await components.restoreManager.restoreFromBackup(backupKey);
        return restored ? 0 : 1;
      }
      case 'list': {
        try {
          const [prefix, bucket] = args;
          const backups = await components.restoreManager.listBackups(prefix, bucket);
          console.log(JSON.stringify(backups, null, 2));
          return 0;
        } catch (error) {
          this.logger.error('Error listing backups', toError(error));
          return 1;
        }
      }
      case 'info': {
        const [backupKey, bucket] = args;
        if (!backupKey) {
          console.error(USAGE);
          return 2;
        }
        const info = await components.restoreManager.getBackupInfo(backupKey, bucket);
        if (!info) {
          return 1;
        }
        console.log(JSON.stringify(info, null, 2));
        return 0;
      }
      default:
        console.error(USAGE);
        return 2;
    }
  }

  /**
   * Start scheduled backups; the process stays alive until a signal arrives
   */
  serve(): number {
    const config = this.config;
    if (!config || !config.backupSchedule) {
      this.logger.error(
        'Service mode requires BACKUP_SCHEDULE',
        new ConfigurationError('Missing required environment variables: BACKUP_SCHEDULE', 'BACKUP_SCHEDULE')
      );
      return 1;
    }

    this.cronScheduler = new CronScheduler(
      {
        cronExpression: config.backupSchedule,
        timezone: 'UTC',
        runOnInit: false,
      },
      this.requireComponents().backupManager,
      this.logger
    );
    this.cronScheduler.start();
    this.setupSignalHandlers();

    this.logger.info('Bucket backup service started', {
      sourceBucket: config.sourceBucket,
      backupBucket: config.backupBucket,
      schedule: config.backupSchedule,
    });
    return 0;
  }

  /**
   * Stop the scheduler
   */
  shutdown(): void {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler && this.cronScheduler.isRunning()) {
      this.cronScheduler.stop();
    }

    this.logger.info('Bucket backup service shutdown completed');
  }

  isServing(): boolean {
    return this.cronScheduler !== null && this.cronScheduler.isRunning();
  }

  private setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.once(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.shutdown();
      });
    });
  }

  private requireComponents(): BackupComponents {
    if (!this.components) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    return this.components;
  }
}

/**
 * Main application entry point
 */
async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [command = 'backup', ...args] = argv;
  const app = new BucketBackupApplication();
  return app.run(command, args);
}

// Export for testing
export { BucketBackupApplication, main };

if (require.main === module) {
  main()
    .then(exitCode => {
      process.exitCode = exitCode;
    })
    .catch(error => {
      console.error('Fatal error starting application:', error);
      process.exitCode = 7;
    });
}

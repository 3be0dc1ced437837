import type { DispatcherConfig } from "./config.js"
import { SqliteTaskStore } from "./db/sqliteTaskStore.js"
import type { TaskStore } from "./db/taskStore.js"
import { DispatchLogger } from "./dispatchLogger.js"
import { LogNotifier, MultiNotifier, type Notifier } from "./notifier.js"
import { TelegramNotifier } from "./notifiers/telegramNotifier.js"
import { OperatorService } from "./operator.js"
import { Dispatcher } from "./taskDispatcher.js"
import type { WorkerLauncher } from "./workers/workerHandle.js"
import { ProcessWorkerLauncher } from "./workers/processWorkerLauncher.js"

export interface Runtime {
    config: DispatcherConfig
    logger: DispatchLogger
    store: TaskStore
    notifier: Notifier
    launcher: WorkerLauncher
    dispatcher: Dispatcher
    operator: OperatorService
    close(): Promise<void>
}

export interface RuntimeOverrides {
    logger?: DispatchLogger
    store?: TaskStore
    launcher?: WorkerLauncher
    notifier?: Notifier
    clock?: () => Date
}

export function createNotifier(config: DispatcherConfig, logger: DispatchLogger): Notifier {
    const log = new LogNotifier(logger)
    if (!config.telegram) return log
    return new MultiNotifier([log, new TelegramNotifier(config.telegram)])
}

export function createRuntime(config: DispatcherConfig, overrides: RuntimeOverrides = {}): Runtime {
    const logger = overrides.logger ?? new DispatchLogger({ filePath: config.logFile })
    const store =
        overrides.store ?? SqliteTaskStore.open(config.dbPath, { onWarning: (message) => logger.warn(message) })
    const notifier = overrides.notifier ?? createNotifier(config, logger)
    const launcher =
        overrides.launcher ?? new ProcessWorkerLauncher({ command: config.workerCommand, logDir: config.logDir })

    const dispatcher = new Dispatcher({
        settings: config,
        store,
        launcher,
        notifier,
        logger,
        clock: overrides.clock,
    })
    const operator = new OperatorService({
        store,
        notifier,
        logger,
        unblockAttempts: config.unblockAttempts,
        clock: overrides.clock,
    })

    return {
        config,
        logger,
        store,
        notifier,
        launcher,
        dispatcher,
        operator,
        close: async () => {
            store.close()
            await logger.flush()
        },
    }
}

import { type PetLogConfig, loadConfigFromEnv, resolveDataFilePath } from './config/PetLogConfig.js';
import { PetLogChanged } from './domain/events/PetLogChanged.js';
import { JsonPetLogRepository } from './infrastructure/persistence/json/JsonPetLogRepository.js';
import { InMemoryEventDispatcher } from './infrastructure/messaging/InMemoryEventDispatcher.js';
import { ConsoleLogger, type ILogger } from './infrastructure/observability/Logger.js';
import { PetLogChangeLogger } from './application/handlers/PetLogChangeLogger.js';
import { PetCareDashboardService } from './application/projections/PetCareDashboardService.js';
import { AddPet } from './application/use-cases/implementation/AddPet.js';
import { UpdatePetDetails } from './application/use-cases/implementation/UpdatePetDetails.js';
import { ArchivePet } from './application/use-cases/implementation/ArchivePet.js';
import { LogActivity } from './application/use-cases/implementation/LogActivity.js';
import { LogFeeding } from './application/use-cases/implementation/LogFeeding.js';
import { ScheduleReminder } from './application/use-cases/implementation/ScheduleReminder.js';
import { CompleteReminder } from './application/use-cases/implementation/CompleteReminder.js';

export interface AppContainerOverrides {
    logger?: ILogger;
    clock?: () => Date;
}

export class AppContainer {
    private constructor(
        // Observability
        public readonly config: PetLogConfig,
        public readonly logger: ILogger,

        // Infrastructure
        public readonly eventDispatcher: InMemoryEventDispatcher,
        public readonly repository: JsonPetLogRepository,

        // Projections
        public readonly dashboardService: PetCareDashboardService,

        // Use Cases
        public readonly addPet: AddPet,
        public readonly updatePetDetails: UpdatePetDetails,
        public readonly archivePet: ArchivePet,
        public readonly logActivity: LogActivity,
        public readonly logFeeding: LogFeeding,
        public readonly scheduleReminder: ScheduleReminder,
        public readonly completeReminder: CompleteReminder
    ) { }

    /**
     * Wire the application and load the pet log from the configured data directory.
     */
    static async create(
        config: PetLogConfig = loadConfigFromEnv(),
        overrides: AppContainerOverrides = {}
    ): Promise<AppContainer> {
        // 1. Observability (initialized first, used everywhere)
        const logger = overrides.logger ?? new ConsoleLogger({ context: { service: 'petlog' }, minLevel: config.logLevel });
        const clock = overrides.clock ?? (() => new Date());

        // 2. Infrastructure
        const eventDispatcher = new InMemoryEventDispatcher();
        eventDispatcher.subscribe(PetLogChanged, new PetLogChangeLogger(logger));

        const repository = await JsonPetLogRepository.open({
            filePath: resolveDataFilePath(config),
            atomicWrites: config.atomicWrites,
            logger,
            eventDispatcher,
            clock,
        });

        logger.info('Pet log ready', {
            path: resolveDataFilePath(config),
            pets: repository.pets.length,
        });

        // 3. Projections and use cases
        return new AppContainer(
            config,
            logger,
            eventDispatcher,
            repository,
            new PetCareDashboardService(repository),
            new AddPet(repository),
            new UpdatePetDetails(repository),
            new ArchivePet(repository, clock),
            new LogActivity(repository, clock),
            new LogFeeding(repository, clock),
            new ScheduleReminder(repository, clock),
            new CompleteReminder(repository, clock)
        );
    }
}

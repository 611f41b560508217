// Domain Layer - Exports
export * from './domain/entities/Pet.js';
export * from './domain/entities/PetActivity.js';
export * from './domain/entities/PetReminder.js';
export * from './domain/value-objects/RecurrenceInfo.js';
export * from './domain/services/ActivityClassifier.js';

// Domain Layer - Events
export * from './domain/events/IDomainEvent.js';
export * from './domain/events/PetLogChanged.js';

// Application Layer - Ports, Handlers & Use Cases
export * from './application/ports/IEventDispatcher.js';
export * from './application/ports/IPetLogRepository.js';
export * from './application/handlers/PetLogChangeLogger.js';
export * from './application/use-cases/implementation/AddPet.js';
export * from './application/use-cases/implementation/UpdatePetDetails.js';
export * from './application/use-cases/implementation/ArchivePet.js';
export * from './application/use-cases/implementation/LogActivity.js';
export * from './application/use-cases/implementation/LogFeeding.js';
export * from './application/use-cases/implementation/ScheduleReminder.js';
export * from './application/use-cases/implementation/CompleteReminder.js';

// Application Layer - Projections
export * from './application/read-models/DashboardReadModel.js';
export * from './application/projections/PetCareDashboardService.js';

// Infrastructure Layer
export * from './infrastructure/concurrency/AsyncMutex.js';
export * from './infrastructure/messaging/InMemoryEventDispatcher.js';
export * from './infrastructure/observability/Logger.js';
export * from './infrastructure/persistence/json/JsonPetLogRepository.js';
export * from './infrastructure/persistence/mappers/PetLogSnapshotMapper.js';

// Shared
export * from './shared/errors/ErrorCodes.js';
export * from './shared/errors/PetLogError.js';
export * from './shared/errors/ErrorNormalizer.js';
export * from './shared/utils/RelativeTime.js';
export * from './shared/validation/index.js';

// Composition
export * from './config/PetLogConfig.js';
export * from './AppContainer.js';

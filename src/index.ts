/**
 * @file netinstall-groups
 *
 * Package-group loader for a network installation step.
 *
 * @module
 */

export { NetInstallConfig, type NetInstallDeps } from './netinstall/NetInstallConfig.js';
export { NetInstallBus } from './netinstall/NetInstallBus.js';
export { GroupListModel, MemoryStorage } from './netinstall/collaborators.js';
export { StatusMachine, status_message, type Status, type FailureStatus } from './netinstall/status.js';
export {
    NetInstallError,
    ConfigurationError,
    TransportError,
    DataError,
    InternalError,
} from './netinstall/errors.js';
export { TranslatedString } from './netinstall/labels.js';
export { source_resolve } from './netinstall/source.js';
export { configuration_parse, type NetInstallConfiguration } from './netinstall/parser/configuration.js';
export { groupsDocument_parse, yamlError_explain, type GroupsDocumentResult } from './netinstall/parser/document.js';
export { AsyncFetcher, type FetchOutcome, type FetchStart } from './netinstall/fetch/AsyncFetcher.js';
export { HttpTransport, HttpTransfer } from './netinstall/fetch/HttpTransport.js';
export type { FetchOptions, Transport, TransferHandle, TransferCallback } from './netinstall/fetch/types.js';
export {
    LOCAL_SOURCE,
    translator_identity,
    type GroupRecord,
    type Source,
    type GroupModel,
    type GlobalStorage,
    type Translator,
    type NetInstallEvent,
    type NetInstallObserver,
} from './netinstall/types.js';
export { SettingsService, DEFAULT_USER_AGENT } from './config/settings.js';
export { ConsoleLogger, MemoryLogger, logLevel_parse, type Logger, type LogLevel, type LogEntry } from './logging/logger.js';

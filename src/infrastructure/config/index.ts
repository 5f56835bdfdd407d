export { loadAppConfig, ConfigError } from './app-config.js';
export type { AppConfig, StorageDriver, WeeklySchedule } from './app-config.js';
export { loadEventLabels, DEFAULT_EVENT_LABELS_PATH } from './event-labels.js';

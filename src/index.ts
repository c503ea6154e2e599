export { default as Logger } from './core/logger';
export { loadConfig, loadEnvFile, missingTelegramSettings } from './core/config';
export * from './core/errors';
export * from './transcript/reader';
export * from './context/repository';
export * from './context/resolver';
export * from './dispatch/policy';
export * from './dispatch/dispatcher';
export { default as TelegramChannel, formatTelegramMessage } from './channels/telegram/telegram';
export { default as PostgresChannel, buildConnectionConfig, applySchema } from './channels/postgres/postgres';
export { default as YamlFileChannel, appendYamlEntry } from './channels/yaml/yaml-file';
export { runTelegramNotify } from './hooks/telegram-notify';
export { runSaveUserPrompt } from './hooks/save-user-prompt';
export { runSaveLlmOutput } from './hooks/save-llm-output';
export * from './types';

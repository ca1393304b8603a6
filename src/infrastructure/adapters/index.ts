// Adapters barrel export
export * from './persistence/mongodb';

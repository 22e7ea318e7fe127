export * from './activity-log.schema';
export * from './credential.schema';
export * from './secure-note.schema';
export * from './user.schema';

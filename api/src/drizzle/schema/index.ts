export * from './users';
export * from './events';
export * from './registrations';
export * from './scheduled-reminders';

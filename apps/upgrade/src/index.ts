export * from './lib/version'
export * from './repair/output'
export * from './repair/repair-step'
export * from './repair/remove-link-shares'
export * from './services/groups'
export * from './services/notifications'
export * from './services/notifier'
export * from './services/system-config'
export * from './services/time'

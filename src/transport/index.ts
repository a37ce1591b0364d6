export * from './transport';
export * from './commands';
export * from './ssh-transport';
export * from './dry-run-transport';

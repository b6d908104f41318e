import 'reflect-metadata';
import { startApp } from './bootstrap/create-app';

startApp().catch((error: unknown) => {
  console.error('Failed to start service', error);
  process.exit(1);
});

export { DatabaseService } from './database.service.js';

import { initLogger } from '../../core/logger';

// Keep pino quiet unless a test opts in
initLogger({ logLevel: 'silent' });

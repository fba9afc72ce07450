import { createLogger } from '@adsync/utils';

export const logger = createLogger({ package: 'core' });

import { createLogger } from '@contacts-hub/utils';

export const logger = createLogger({ package: 'core' });

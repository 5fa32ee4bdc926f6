// src/services/base/BaseService.ts

import { Logger, ServiceConfig } from './types';

export abstract class BaseService {
    protected logger: Logger;

    constructor(config: ServiceConfig) {
        this.logger = config.logger;
    }

    protected errorMessage(error: unknown): string {
        return error instanceof Error ? error.message : String(error);
    }
}

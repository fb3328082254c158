import { Router, type NextFunction, type Request, type Response } from 'express';
import type { Controller } from '../interfaces/Controller';
import type { Core } from '../../Core';

export class HealthController implements Controller {
    public path = '/health';
    public router: Router = Router();

    constructor(private core: Core) {
        this.router.get(`${this.path}`, this.getHealth.bind(this));
    }

    async getHealth(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const health = {
                status: 'healthy',
                timestamp: this.core.clock.now().toISOString(),
                checks: {
                    storage: { status: 'unknown', backend: this.core.config.storageBackend, message: '' },
                },
            };

            try {
                const habits = await this.core.checkStorage();
                health.checks.storage = {
                    ...health.checks.storage,
                    status: 'healthy',
                    message: `${habits} habit(s) stored`,
                };
            } catch (error) {
                health.checks.storage = {
                    ...health.checks.storage,
                    status: 'unhealthy',
                    message: error instanceof Error ? error.message : 'Storage check failed',
                };
                health.status = 'unhealthy';
            }

            res.status(health.status === 'healthy' ? 200 : 503).json(health);
        } catch (error) {
            next(error);
        }
    }
}

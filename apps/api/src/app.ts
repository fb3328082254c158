import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import type { Server } from 'http';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import { Core } from './infrastructure/Core';
import { HabitController } from './infrastructure/http/controllers/HabitController';
import { AnalyticsController } from './infrastructure/http/controllers/AnalyticsController';
import { HealthController } from './infrastructure/http/controllers/HealthController';
import { CreateHabit } from './application/useCases/CreateHabit';
import { GetHabits } from './application/useCases/GetHabits';
import { RenameHabit } from './application/useCases/RenameHabit';
import { DeleteHabit } from './application/useCases/DeleteHabit';
import { CheckOffHabit } from './application/useCases/CheckOffHabit';
import { GetHabitAnalytics } from './application/useCases/GetHabitAnalytics';
import { SeedSampleHabits } from './application/useCases/SeedSampleHabits';
import logger from './infrastructure/logger';

export class App {
    public app: express.Application;

    constructor(private core: Core) {
        this.app = express();

        this.initializeMiddlewares();
        this.initializeControllers();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares() {
        this.app.use(helmet());
        this.app.use(express.json());

        const limiter = rateLimit({
            windowMs: 15 * 60 * 1000, // 15 minutes
            limit: 300,
            standardHeaders: true,
            legacyHeaders: false,
        });
        this.app.use(limiter);

        this.app.use(cors({
            origin: this.core.config.corsOrigin,
            methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
        }));
    }

    private initializeControllers() {
        const habitController = new HabitController(
            this.core.getUseCase(CreateHabit),
            this.core.getUseCase(GetHabits),
            this.core.getUseCase(RenameHabit),
            this.core.getUseCase(DeleteHabit),
            this.core.getUseCase(CheckOffHabit),
            this.core.getUseCase(SeedSampleHabits),
            this.core.clock,
        );
        const analyticsController = new AnalyticsController(this.core.getUseCase(GetHabitAnalytics), this.core.clock);
        const healthController = new HealthController(this.core);
        const controllers = [
            habitController,
            analyticsController,
            healthController,
        ];
        controllers.forEach((controller) => {
            this.app.use('/', controller.router);
        });
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen(): Server {
        const port = this.core.config.port;
        return this.app.listen(port, () => {
            logger.info(`Server running on http://localhost:${port}`);
        });
    }
}

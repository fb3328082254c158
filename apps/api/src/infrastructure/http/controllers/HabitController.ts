import { Router, type NextFunction, type Request, type Response } from 'express';
import {
    checkOffSchema,
    createHabitSchema,
    listHabitsQuerySchema,
    renameHabitSchema,
    type CheckOffResponse,
} from '@habit-streaks/types';
import type { Controller } from '../interfaces/Controller';
import { writeRateLimiter } from '../middleware/rateLimiter';
import { AppError } from '../../../domain/errors/AppError';
import { describeHabit, summarizeHabit } from '../../../domain/services/HabitAnalytics';
import { formatTimestamp, parseTimestamp } from '../../../domain/services/Timestamps';
import type { ClockProvider } from '../../../application/providers/ClockProvider';
import { CreateHabit } from '../../../application/useCases/CreateHabit';
import { GetHabits } from '../../../application/useCases/GetHabits';
import { RenameHabit } from '../../../application/useCases/RenameHabit';
import { DeleteHabit } from '../../../application/useCases/DeleteHabit';
import { CheckOffHabit } from '../../../application/useCases/CheckOffHabit';
import { SeedSampleHabits } from '../../../application/useCases/SeedSampleHabits';

export class HabitController implements Controller {
    public path = '/habits';
    public router: Router = Router();

    constructor(
        private createHabit: CreateHabit,
        private getHabits: GetHabits,
        private renameHabit: RenameHabit,
        private deleteHabit: DeleteHabit,
        private checkOffHabit: CheckOffHabit,
        private seedSampleHabits: SeedSampleHabits,
        private clock: ClockProvider,
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.get(`${this.path}`, this.getAll.bind(this));
        this.router.post(`${this.path}`, writeRateLimiter, this.create.bind(this));
        this.router.post(`${this.path}/sample`, writeRateLimiter, this.seed.bind(this));
        this.router.get(`${this.path}/:id`, this.getById.bind(this));
        this.router.patch(`${this.path}/:id`, writeRateLimiter, this.rename.bind(this));
        this.router.delete(`${this.path}/:id`, writeRateLimiter, this.remove.bind(this));
        this.router.post(`${this.path}/:id/check-offs`, writeRateLimiter, this.checkOff.bind(this));
    }

    async getAll(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { periodicity } = listHabitsQuerySchema.parse(req.query);
            const habits = await this.getHabits.executeGetAll(periodicity);
            const today = this.clock.now();
            res.json(habits.map(habit => summarizeHabit(habit, today)));
        } catch (error) {
            next(error);
        }
    }

    async create(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { name, periodicity } = createHabitSchema.parse(req.body);
            const habit = await this.createHabit.execute(name, periodicity);
            res.status(201).json(describeHabit(habit, this.clock.now()));
        } catch (error) {
            next(error);
        }
    }

    async getById(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const habit = await this.getHabits.executeGetById(req.params.id);
            if (!habit) {
                throw new AppError('Habit not found', 404);
            }
            res.json(describeHabit(habit, this.clock.now()));
        } catch (error) {
            next(error);
        }
    }

    async rename(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { name } = renameHabitSchema.parse(req.body);
            const habit = await this.renameHabit.execute(req.params.id, name);
            if (!habit) {
                throw new AppError('Habit not found', 404);
            }
            res.json(describeHabit(habit, this.clock.now()));
        } catch (error) {
            next(error);
        }
    }

    async remove(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const deleted = await this.deleteHabit.execute(req.params.id);
            if (!deleted) {
                throw new AppError('Habit not found', 404);
            }
            res.status(204).end();
        } catch (error) {
            next(error);
        }
    }

    async checkOff(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { timestamp } = checkOffSchema.parse(req.body ?? {});
            const habitId = req.params.id;
            const outcome = await this.checkOffHabit.execute(habitId, timestamp ? parseTimestamp(timestamp) : undefined);

            let body: CheckOffResponse;
            switch (outcome.status) {
                case 'not-found':
                    throw new AppError('Habit not found', 404);
                case 'duplicate':
                    body = { accepted: false, habitId, reason: 'duplicate-period' };
                    res.status(409).json(body);
                    return;
                case 'accepted':
                    body = { accepted: true, habitId, timestamp: formatTimestamp(outcome.timestamp) };
                    res.status(201).json(body);
                    return;
            }
        } catch (error) {
            next(error);
        }
    }

    async seed(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const result = await this.seedSampleHabits.execute();
            if (!result.seeded) {
                res.status(409).json({
                    message: 'Store already contains habits; sample data not added',
                    existing: result.existing,
                });
                return;
            }

            const today = this.clock.now();
            res.status(201).json(result.habits.map(habit => summarizeHabit(habit, today)));
        } catch (error) {
            next(error);
        }
    }
}

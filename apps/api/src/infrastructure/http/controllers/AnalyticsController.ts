import { Router, type NextFunction, type Request, type Response } from 'express';
import {
    createdRangeQuerySchema,
    mostActiveQuerySchema,
    staleHabitsQuerySchema,
    streakThresholdQuerySchema,
} from '@habit-streaks/types';
import type { Controller } from '../interfaces/Controller';
import { summarizeHabit } from '../../../domain/services/HabitAnalytics';
import type { ClockProvider } from '../../../application/providers/ClockProvider';
import { GetHabitAnalytics } from '../../../application/useCases/GetHabitAnalytics';

export class AnalyticsController implements Controller {
    public path = '/analytics';
    public router: Router = Router();

    constructor(
        private analytics: GetHabitAnalytics,
        private clock: ClockProvider,
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.get(`${this.path}/summary`, this.getSummary.bind(this));
        this.router.get(`${this.path}/streaks`, this.getStreaks.bind(this));
        this.router.get(`${this.path}/streaks/top`, this.getTopStreak.bind(this));
        this.router.get(`${this.path}/streaks/active`, this.getActiveStreaks.bind(this));
        this.router.get(`${this.path}/stale`, this.getStale.bind(this));
        this.router.get(`${this.path}/most-active`, this.getMostActive.bind(this));
        this.router.get(`${this.path}/completion-rates`, this.getCompletionRates.bind(this));
        this.router.get(`${this.path}/created`, this.getCreatedBetween.bind(this));
    }

    async getSummary(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            res.json(await this.analytics.executeStatistics());
        } catch (error) {
            next(error);
        }
    }

    async getStreaks(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            res.json(await this.analytics.executeStreaks());
        } catch (error) {
            next(error);
        }
    }

    async getTopStreak(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { habit, streak } = await this.analytics.executeLongestStreak();
            res.json({
                habit: habit ? summarizeHabit(habit, this.clock.now()) : null,
                streak,
            });
        } catch (error) {
            next(error);
        }
    }

    async getActiveStreaks(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { min } = streakThresholdQuerySchema.parse(req.query);
            const habits = await this.analytics.executeActiveStreaks(min);
            const today = this.clock.now();
            res.json(habits.map(habit => summarizeHabit(habit, today)));
        } catch (error) {
            next(error);
        }
    }

    async getStale(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { days } = staleHabitsQuerySchema.parse(req.query);
            const habits = await this.analytics.executeStale(days);
            const today = this.clock.now();
            res.json(habits.map(habit => summarizeHabit(habit, today)));
        } catch (error) {
            next(error);
        }
    }

    async getMostActive(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { limit } = mostActiveQuerySchema.parse(req.query);
            const entries = await this.analytics.executeMostActive(limit);
            const today = this.clock.now();
            res.json(entries.map(({ habit, checkOffCount }) => ({
                habit: summarizeHabit(habit, today),
                checkOffCount,
            })));
        } catch (error) {
            next(error);
        }
    }

    async getCompletionRates(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            res.json(await this.analytics.executeCompletionRates());
        } catch (error) {
            next(error);
        }
    }

    async getCreatedBetween(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { from, to } = createdRangeQuerySchema.parse(req.query);
            const habits = await this.analytics.executeCreatedBetween(from, to);
            const today = this.clock.now();
            res.json(habits.map(habit => summarizeHabit(habit, today)));
        } catch (error) {
            next(error);
        }
    }
}

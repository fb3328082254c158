import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { HabitController } from '../src/infrastructure/http/controllers/HabitController';
import { CreateHabit } from '../src/application/useCases/CreateHabit';
import { GetHabits } from '../src/application/useCases/GetHabits';
import { RenameHabit } from '../src/application/useCases/RenameHabit';
import { DeleteHabit } from '../src/application/useCases/DeleteHabit';
import { CheckOffHabit } from '../src/application/useCases/CheckOffHabit';
import { SeedSampleHabits } from '../src/application/useCases/SeedSampleHabits';
import { AppError } from '../src/domain/errors/AppError';
import { InMemoryHabitRepository } from '../src/infrastructure/repositories/InMemoryHabitRepository';
import { at, fixedClock, habitWith, providerFor } from './helpers/fixtures';

describe('HabitController', () => {
    const clock = fixedClock(at(2026, 10, 19, 12));
    let repository: InMemoryHabitRepository;
    let controller: HabitController;
    let mockReq: Partial<Request>;
    let mockRes: Partial<Response>;
    let mockNext: Mock;

    function buildController(): HabitController {
        const repositories = providerFor(repository);
        return new HabitController(
            new CreateHabit(repositories, clock),
            new GetHabits(repositories),
            new RenameHabit(repositories),
            new DeleteHabit(repositories),
            new CheckOffHabit(repositories, clock),
            new SeedSampleHabits(repositories, clock),
            clock,
        );
    }

    function nextError(): unknown {
        expect(mockNext).toHaveBeenCalledTimes(1);
        return mockNext.mock.calls[0][0];
    }

    beforeEach(() => {
        repository = new InMemoryHabitRepository([
            habitWith('daily', [at(2026, 10, 18, 8)], { id: 'read', name: 'Read', createdAt: at(2026, 10, 1) }),
            habitWith('weekly', [], { id: 'gym', name: 'Gym', createdAt: at(2026, 10, 2) }),
        ]);
        controller = buildController();

        mockReq = {
            query: {},
            params: {},
            body: {},
        };

        mockRes = {
            status: vi.fn().mockReturnThis(),
            json: vi.fn().mockReturnThis(),
            end: vi.fn().mockReturnThis(),
        };

        mockNext = vi.fn();
    });

    describe('GET /habits', () => {
        it('should list summaries filtered by periodicity', async () => {
            mockReq.query = { periodicity: 'weekly' };

            await controller.getAll(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.json).toHaveBeenCalledWith([{
                id: 'gym',
                name: 'Gym',
                periodicity: 'weekly',
                createdAt: '2026-10-02T09:00:00.000Z',
                checkOffCount: 0,
                currentStreak: 0,
                longestStreak: 0,
                lastCheckOff: null,
            }]);
        });

        it('should reject an unknown periodicity filter', async () => {
            mockReq.query = { periodicity: 'monthly' };

            await controller.getAll(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(nextError()).toBeInstanceOf(ZodError);
            expect(mockRes.json).not.toHaveBeenCalled();
        });
    });

    describe('POST /habits', () => {
        it('should create a habit and respond with 201', async () => {
            mockReq.body = { name: 'Stretch', periodicity: 'daily' };

            await controller.create(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.status).toHaveBeenCalledWith(201);
            expect(mockRes.json).toHaveBeenCalledWith(expect.objectContaining({
                name: 'Stretch',
                periodicity: 'daily',
                createdAt: '2026-10-19T12:00:00.000Z',
                checkOffs: [],
            }));
            expect(await repository.count()).toBe(3);
        });

        it('should pass validation errors to the error handler', async () => {
            mockReq.body = { name: '', periodicity: 'daily' };

            await controller.create(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(nextError()).toBeInstanceOf(ZodError);
            expect(await repository.count()).toBe(2);
        });
    });

    describe('GET /habits/:id', () => {
        it('should return the habit with its check-offs', async () => {
            mockReq.params = { id: 'read' };

            await controller.getById(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.json).toHaveBeenCalledWith(expect.objectContaining({
                id: 'read',
                currentStreak: 0,
                longestStreak: 1,
                checkOffs: ['2026-10-18T08:00:00.000Z'],
            }));
        });

        it('should answer 404 for an unknown id', async () => {
            mockReq.params = { id: 'missing' };

            await controller.getById(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            const error = nextError();
            expect(error).toBeInstanceOf(AppError);
            expect(error).toMatchObject({ statusCode: 404, message: 'Habit not found' });
        });
    });

    describe('PATCH /habits/:id', () => {
        it('should rename the habit', async () => {
            mockReq.params = { id: 'read' };
            mockReq.body = { name: 'Read fiction' };

            await controller.rename(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.json).toHaveBeenCalledWith(expect.objectContaining({ id: 'read', name: 'Read fiction' }));
        });
    });

    describe('DELETE /habits/:id', () => {
        it('should respond 204 with no body', async () => {
            mockReq.params = { id: 'gym' };

            await controller.remove(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.status).toHaveBeenCalledWith(204);
            expect(mockRes.end).toHaveBeenCalled();
            expect(await repository.findById('gym')).toBeNull();
        });

        it('should answer 404 when nothing was deleted', async () => {
            mockReq.params = { id: 'missing' };

            await controller.remove(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(nextError()).toMatchObject({ statusCode: 404 });
        });
    });

    describe('POST /habits/:id/check-offs', () => {
        it('should accept a check-off at the current time without a body', async () => {
            mockReq.params = { id: 'read' };
            mockReq.body = undefined;

            await controller.checkOff(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.status).toHaveBeenCalledWith(201);
            expect(mockRes.json).toHaveBeenCalledWith({
                accepted: true,
                habitId: 'read',
                timestamp: '2026-10-19T12:00:00.000Z',
            });
        });

        it('should accept a backdated timestamp', async () => {
            mockReq.params = { id: 'read' };
            mockReq.body = { timestamp: '2026-10-17T07:30:00Z' };

            await controller.checkOff(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.json).toHaveBeenCalledWith({
                accepted: true,
                habitId: 'read',
                timestamp: '2026-10-17T07:30:00.000Z',
            });
        });

        it('should file a timestamp with an offset under the date it was written on', async () => {
            mockReq.params = { id: 'read' };
            mockReq.body = { timestamp: '2026-10-19T23:30:00-05:00' };

            await controller.checkOff(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.json).toHaveBeenLastCalledWith({
                accepted: true,
                habitId: 'read',
                timestamp: '2026-10-19T23:30:00.000Z',
            });

            mockReq.body = { timestamp: '2026-10-20T01:00:00Z' };

            await controller.checkOff(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.json).toHaveBeenLastCalledWith({
                accepted: true,
                habitId: 'read',
                timestamp: '2026-10-20T01:00:00.000Z',
            });
            expect(mockRes.status).not.toHaveBeenCalledWith(409);
        });

        it('should answer 409 for a second check-off in the same period', async () => {
            mockReq.params = { id: 'read' };
            mockReq.body = { timestamp: '2026-10-18T20:00:00Z' };

            await controller.checkOff(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.status).toHaveBeenCalledWith(409);
            expect(mockRes.json).toHaveBeenCalledWith({
                accepted: false,
                habitId: 'read',
                reason: 'duplicate-period',
            });
            expect(mockNext).not.toHaveBeenCalled();
        });

        it('should answer 404 for an unknown habit', async () => {
            mockReq.params = { id: 'missing' };

            await controller.checkOff(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(nextError()).toMatchObject({ statusCode: 404 });
        });

        it('should reject a timestamp that is not ISO-8601', async () => {
            mockReq.params = { id: 'read' };
            mockReq.body = { timestamp: 'yesterday' };

            await controller.checkOff(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(nextError()).toBeInstanceOf(ZodError);
        });

        it('should reject a timestamp on a day the month does not have', async () => {
            mockReq.params = { id: 'read' };
            mockReq.body = { timestamp: '2026-02-30T08:00:00Z' };

            await controller.checkOff(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(nextError()).toBeInstanceOf(ZodError);
            expect(mockRes.json).not.toHaveBeenCalled();
        });
    });

    describe('POST /habits/sample', () => {
        it('should refuse to seed a store that already has habits', async () => {
            await controller.seed(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.status).toHaveBeenCalledWith(409);
            expect(mockRes.json).toHaveBeenCalledWith({
                message: 'Store already contains habits; sample data not added',
                existing: 2,
            });
        });

        it('should seed an empty store', async () => {
            repository = new InMemoryHabitRepository();
            controller = buildController();

            await controller.seed(mockReq as Request, mockRes as Response, mockNext as NextFunction);

            expect(mockRes.status).toHaveBeenCalledWith(201);
            expect(await repository.count()).toBe(5);
        });
    });
});

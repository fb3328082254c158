import { pgTable, uuid, text, timestamp, index, uniqueIndex } from "drizzle-orm/pg-core";

export const habits = pgTable("habits", {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    periodicity: text("periodicity").notNull(), // "daily" | "weekly"
    createdAt: timestamp("created_at").notNull(),
}, (table) => ([
    index("idx_habits_created_at").on(table.createdAt),
]));

export const checkOffs = pgTable("check_offs", {
    id: uuid("id").primaryKey().defaultRandom(),
    habitId: text("habit_id").notNull().references(() => habits.id, { onDelete: 'cascade' }),
    checkedAt: timestamp("checked_at").notNull(),
    // Period key (yyyy-MM-dd of the period start); one check-off per period
    periodKey: text("period_key").notNull(),
}, (table) => ([
    index("idx_check_offs_habit_id").on(table.habitId, table.checkedAt),
    uniqueIndex("idx_check_offs_habit_period").on(table.habitId, table.periodKey),
]));

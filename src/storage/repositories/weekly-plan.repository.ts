/**
 * WeeklyPlan Repository Implementation
 */

import { desc, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { weeklyPlans } from '../schema';
import type { CalendarDate } from '@/core/sm2/calendar';
import type { WeeklyPlan, WeeklyPlanContent } from '@/core/models';
import type { WeeklyPlanStore } from '@/core/planning';
import { generateId } from './base';

export interface CreateWeeklyPlanInput {
  userId: string;
  weekStartDate: CalendarDate;
  plan: WeeklyPlanContent;
  focusRequest?: string | null;
  events?: string | null;
}

function mapToDomain(row: typeof weeklyPlans.$inferSelect): WeeklyPlan {
  return {
    id: row.id,
    userId: row.userId,
    weekStartDate: row.weekStartDate,
    plan: row.planData,
    focusRequest: row.focusRequest,
    events: row.events,
    generatedAt: row.generatedAt,
  };
}

export class WeeklyPlanRepository implements WeeklyPlanStore {
  constructor(private readonly db: AppDatabase) {}

  findById(id: string): WeeklyPlan | null {
    const row = this.db.select().from(weeklyPlans).where(eq(weeklyPlans.id, id)).get();
    return row ? mapToDomain(row) : null;
  }

  create(input: CreateWeeklyPlanInput): WeeklyPlan {
    const [row] = this.db
      .insert(weeklyPlans)
      .values({
        id: generateId('wp'),
        userId: input.userId,
        weekStartDate: input.weekStartDate,
        planData: input.plan,
        focusRequest: input.focusRequest ?? null,
        events: input.events ?? null,
        generatedAt: new Date(),
      })
      .returning()
      .all();

    return mapToDomain(row);
  }

  /**
   * Plans for a student, most recently generated first. Plans generated in
   * the same millisecond keep insertion order.
   */
  findByUser(userId: string): WeeklyPlan[] {
    return this.db
      .select()
      .from(weeklyPlans)
      .where(eq(weeklyPlans.userId, userId))
      .orderBy(desc(weeklyPlans.generatedAt), desc(sql`rowid`))
      .all()
      .map(mapToDomain);
  }

  findLatestByUser(userId: string): WeeklyPlan | null {
    const row = this.db
      .select()
      .from(weeklyPlans)
      .where(eq(weeklyPlans.userId, userId))
      .orderBy(desc(weeklyPlans.generatedAt), desc(sql`rowid`))
      .limit(1)
      .get();

    return row ? mapToDomain(row) : null;
  }
}

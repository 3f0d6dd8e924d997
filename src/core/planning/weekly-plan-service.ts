/**
 * WeeklyPlanService
 *
 * Gathers a student's curriculum, due topics and history into a
 * {@link WeeklyPlanContext}, asks the configured generator for a plan and
 * stores the result.
 */

import { NotFoundError, ValidationError } from '../errors';
import { isCalendarDate, nextMonday, today, type CalendarDate } from '../sm2/calendar';
import type { WeeklyPlan, WeeklyPlanContent } from '../models';
import type { CurriculumStore, StudentLookup } from '../curriculum/curriculum-importer';
import { DueTopicQuery } from '../review/due-topics';
import type { TopicStateStore } from '../review/types';
import type { WeeklyPlanContext, WeeklyPlanGenerator } from './types';

/**
 * Persistence for generated plans.
 */
export interface WeeklyPlanStore {
  create(input: {
    userId: string;
    weekStartDate: CalendarDate;
    plan: WeeklyPlanContent;
    focusRequest?: string | null;
    events?: string | null;
  }): WeeklyPlan;
  findLatestByUser(userId: string): WeeklyPlan | null;
}

export interface GenerateWeeklyPlanInput {
  userId: string;
  /** Defaults to the Monday after `asOf` */
  weekStartDate?: CalendarDate;
  focusRequest?: string | null;
  events?: string | null;
  /** Defaults to today */
  asOf?: CalendarDate;
}

export interface WeeklyPlanServiceDeps {
  students: StudentLookup;
  curriculum: Pick<CurriculumStore, 'findActiveItems'>;
  topicStates: TopicStateStore;
  plans: WeeklyPlanStore;
  generator: WeeklyPlanGenerator;
  dueTopics?: DueTopicQuery;
}

function blankToNull(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export class WeeklyPlanService {
  private readonly dueTopics: DueTopicQuery;

  constructor(private readonly deps: WeeklyPlanServiceDeps) {
    this.dueTopics = deps.dueTopics ?? new DueTopicQuery(deps.topicStates);
  }

  /**
   * Assembles the planning context without calling the generator.
   *
   * @throws NotFoundError when the student does not exist
   * @throws ValidationError for a malformed date
   */
  buildContext(input: GenerateWeeklyPlanInput): WeeklyPlanContext {
    const asOf = input.asOf ?? today();
    if (!isCalendarDate(asOf)) {
      throw new ValidationError(`asOf must be a YYYY-MM-DD date, received '${asOf}'`, { field: 'asOf' });
    }
    const weekStartDate = input.weekStartDate ?? nextMonday(asOf);
    if (!isCalendarDate(weekStartDate)) {
      throw new ValidationError(`weekStartDate must be a YYYY-MM-DD date, received '${weekStartDate}'`, {
        field: 'weekStartDate',
      });
    }

    const student = this.deps.students.findById(input.userId);
    if (!student) {
      throw new NotFoundError('Student', input.userId);
    }

    return {
      student,
      weekStartDate,
      asOf,
      curriculum: this.deps.curriculum.findActiveItems(student.id, asOf),
      dueTopics: this.dueTopics.listDue(student.id, asOf),
      history: this.deps.topicStates.queryStates(student.id),
      focusRequest: blankToNull(input.focusRequest),
      events: blankToNull(input.events),
    };
  }

  /**
   * Generates and stores a plan for the week.
   *
   * @throws NotFoundError when the student does not exist
   * @throws LLMError when the generator fails; nothing is stored
   */
  async generate(input: GenerateWeeklyPlanInput): Promise<WeeklyPlan> {
    const context = this.buildContext(input);
    const content = await this.deps.generator.generateWeeklyPlan(context);

    return this.deps.plans.create({
      userId: context.student.id,
      weekStartDate: context.weekStartDate,
      plan: content,
      focusRequest: context.focusRequest,
      events: context.events,
    });
  }

  /**
   * The most recently generated plan, or null if none exists.
   *
   * @throws NotFoundError when the student does not exist
   */
  latest(userId: string): WeeklyPlan | null {
    if (!this.deps.students.findById(userId)) {
      throw new NotFoundError('Student', userId);
    }
    return this.deps.plans.findLatestByUser(userId);
  }
}

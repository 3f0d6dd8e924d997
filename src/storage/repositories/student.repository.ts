/**
 * Student Repository Implementation
 *
 * Data access for student profiles. Profile fields are validated here, the
 * single write path, so the API and CLI share the same rules.
 */

import { asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { students } from '../schema';
import type { Student } from '@/core/models';
import { NotFoundError } from '@/core/errors';
import { assertValidProfile, normalizeSubjects } from '@/core/students';
import { generateId } from './base';

/**
 * Input type for creating a new Student.
 */
export interface CreateStudentInput {
  /** Optional explicit id; a 'stu_' id is generated otherwise */
  id?: string;
  name: string;
  grade: string;
  board: string;
  dailyDurationMinutes: number;
  weeklyFrequency: number;
  subjects: string[];
  studyTimePreference?: string | null;
}

/**
 * Fields that can change after creation. Omitted fields are left alone;
 * `studyTimePreference: null` clears the preference.
 */
export interface UpdateStudentInput {
  dailyDurationMinutes?: number;
  weeklyFrequency?: number;
  subjects?: string[];
  studyTimePreference?: string | null;
}

function mapToDomain(row: typeof students.$inferSelect): Student {
  return {
    id: row.id,
    name: row.name,
    grade: row.grade,
    board: row.board,
    dailyDurationMinutes: row.dailyDurationMinutes,
    weeklyFrequency: row.weeklyFrequency,
    subjects: row.subjects,
    studyTimePreference: row.studyTimePreference,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * @example
 * ```typescript
 * const repo = new StudentRepository(db);
 * const student = repo.create({
 *   name: 'Asha',
 *   grade: '5',
 *   board: 'CBSE',
 *   dailyDurationMinutes: 45,
 *   weeklyFrequency: 5,
 *   subjects: ['Maths', 'Science'],
 * });
 * ```
 */
export class StudentRepository {
  constructor(private readonly db: AppDatabase) {}

  findById(id: string): Student | null {
    const row = this.db.select().from(students).where(eq(students.id, id)).get();
    return row ? mapToDomain(row) : null;
  }

  /**
   * Like {@link findById} but throws when the student is missing.
   *
   * @throws NotFoundError
   */
  getById(id: string): Student {
    const student = this.findById(id);
    if (!student) {
      throw new NotFoundError('Student', id);
    }
    return student;
  }

  /** All students, oldest profile first. */
  findAll(): Student[] {
    return this.db.select().from(students).orderBy(asc(students.createdAt), asc(students.id)).all().map(mapToDomain);
  }

  /**
   * @throws ValidationError when a profile field is out of range
   */
  create(input: CreateStudentInput): Student {
    assertValidProfile(input);
    const now = new Date();

    const [row] = this.db
      .insert(students)
      .values({
        id: input.id ?? generateId('stu'),
        name: input.name.trim(),
        grade: input.grade.trim(),
        board: input.board.trim(),
        dailyDurationMinutes: input.dailyDurationMinutes,
        weeklyFrequency: input.weeklyFrequency,
        subjects: normalizeSubjects(input.subjects),
        studyTimePreference: input.studyTimePreference ?? null,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .all();

    return mapToDomain(row);
  }

  /**
   * Applies a partial profile update.
   *
   * @throws ValidationError when a supplied field is out of range
   * @throws NotFoundError when the student does not exist
   */
  update(id: string, input: UpdateStudentInput): Student {
    assertValidProfile(input);

    const [row] = this.db
      .update(students)
      .set({
        ...(input.dailyDurationMinutes !== undefined && { dailyDurationMinutes: input.dailyDurationMinutes }),
        ...(input.weeklyFrequency !== undefined && { weeklyFrequency: input.weeklyFrequency }),
        ...(input.subjects !== undefined && { subjects: normalizeSubjects(input.subjects) }),
        ...(input.studyTimePreference !== undefined && { studyTimePreference: input.studyTimePreference }),
        updatedAt: new Date(),
      })
      .where(eq(students.id, id))
      .returning()
      .all();

    if (!row) {
      throw new NotFoundError('Student', id);
    }
    return mapToDomain(row);
  }
}

import { Department } from '../entities/department.entity';

export const DEPARTMENT_REPOSITORY = Symbol('DEPARTMENT_REPOSITORY');

/**
 * Storage port for departments.
 *
 * Works as a unit of work: `add`, `update` and `delete` only stage changes,
 * `commit` applies everything staged and reports how many rows it touched.
 * Name lookups compare case-insensitively, list queries order by name.
 */
export interface IDepartmentRepository {
  /** Stages an insert. The record's `id` is assigned when the change is committed. */
  add(department: Department): Promise<Department>;

  update(department: Department): Promise<Department>;

  /** Stages a delete; resolves `false` when no department has this id. */
  delete(id: number): Promise<boolean>;

  getById(id: number): Promise<Department | null>;

  getByName(name: string): Promise<Department | null>;

  getAll(): Promise<Department[]>;

  searchByName(keyword: string): Promise<Department[]>;

  /**
   * @param excludeId - ignore the department with this id, so a record never
   * collides with its own name
   */
  existsByName(name: string, excludeId?: number): Promise<boolean>;

  commit(): Promise<number>;
}

export type StagedChange =
  | { kind: 'insert'; department: Department }
  | { kind: 'update'; department: Department }
  | { kind: 'delete'; id: number };

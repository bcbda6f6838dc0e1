import { Injectable } from '@nestjs/common';
import { Department, toNameKey } from '../entities/department.entity';
import { IDepartmentRepository, StagedChange } from './department.repository';

interface StoredDepartment {
  id: number;
  name: string;
  description: string;
}

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Process-local department store. Ids start at 1 and never leave gaps.
 * Reads hand out copies, so callers only change stored rows through `commit`.
 */
@Injectable()
export class InMemoryDepartmentRepository implements IDepartmentRepository {
  private readonly rows = new Map<number, StoredDepartment>();
  private pending: StagedChange[] = [];
  private nextId = 1;

  async add(department: Department): Promise<Department> {
    this.pending.push({ kind: 'insert', department });
    return department;
  }

  async update(department: Department): Promise<Department> {
    this.pending.push({ kind: 'update', department });
    return department;
  }

  async delete(id: number): Promise<boolean> {
    if (!this.rows.has(id)) {
      return false;
    }
    this.pending.push({ kind: 'delete', id });
    return true;
  }

  async getById(id: number): Promise<Department | null> {
    const row = this.rows.get(id);
    return row ? this.toDepartment(row) : null;
  }

  async getByName(name: string): Promise<Department | null> {
    const key = toNameKey(name);
    const row = [...this.rows.values()].find((candidate) => toNameKey(candidate.name) === key);
    return row ? this.toDepartment(row) : null;
  }

  async getAll(): Promise<Department[]> {
    return [...this.rows.values()].sort(byName).map((row) => this.toDepartment(row));
  }

  async searchByName(keyword: string): Promise<Department[]> {
    const needle = toNameKey(keyword);
    return [...this.rows.values()]
      .filter((row) => toNameKey(row.name).includes(needle))
      .sort(byName)
      .map((row) => this.toDepartment(row));
  }

  async existsByName(name: string, excludeId?: number): Promise<boolean> {
    const key = toNameKey(name);
    return [...this.rows.values()].some(
      (row) => row.id !== excludeId && toNameKey(row.name) === key,
    );
  }

  async commit(): Promise<number> {
    const changes = this.pending;
    this.pending = [];

    let affected = 0;
    for (const change of changes) {
      affected += this.apply(change);
    }
    return affected;
  }

  /** Number of committed departments. */
  get size(): number {
    return this.rows.size;
  }

  private apply(change: StagedChange): number {
    switch (change.kind) {
      case 'insert': {
        const id = this.nextId++;
        this.rows.set(id, {
          id,
          name: change.department.name,
          description: change.department.description ?? '',
        });
        change.department.id = id;
        return 1;
      }
      case 'update': {
        const row = this.rows.get(change.department.id);
        if (!row) {
          return 0;
        }
        row.name = change.department.name;
        row.description = change.department.description ?? '';
        return 1;
      }
      case 'delete':
        return this.rows.delete(change.id) ? 1 : 0;
    }
  }

  private toDepartment(row: StoredDepartment): Department {
    const department = new Department();
    department.id = row.id;
    department.name = row.name;
    department.description = row.description;
    return department;
  }
}

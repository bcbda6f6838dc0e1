import { Injectable, Scope } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Not, QueryFailedError, Repository } from 'typeorm';
import { Department, toNameKey } from '../entities/department.entity';
import { duplicateDepartmentName } from '../errors/department.exceptions';
import { IDepartmentRepository, StagedChange } from './department.repository';

// PostgreSQL unique_violation and the SQLite driver codes.
const UNIQUE_VIOLATION_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT']);

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return false;
  }
  if ('code' in driverError && typeof driverError.code === 'string' && UNIQUE_VIOLATION_CODES.has(driverError.code)) {
    return true;
  }
  // sql.js reports only the SQLite message.
  return error.message.startsWith('UNIQUE constraint failed');
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

/**
 * TypeORM-backed department store. One instance per request, so staged
 * changes never leak between requests; `commit` runs them in a transaction.
 */
@Injectable({ scope: Scope.REQUEST })
export class TypeOrmDepartmentRepository implements IDepartmentRepository {
  private pending: StagedChange[] = [];

  constructor(
    @InjectRepository(Department)
    private readonly departmentRepository: Repository<Department>,
  ) {}

  async add(department: Department): Promise<Department> {
    this.pending.push({ kind: 'insert', department });
    return department;
  }

  async update(department: Department): Promise<Department> {
    this.pending.push({ kind: 'update', department });
    return department;
  }

  async delete(id: number): Promise<boolean> {
    const exists = await this.departmentRepository.existsBy({ id });
    if (!exists) {
      return false;
    }
    this.pending.push({ kind: 'delete', id });
    return true;
  }

  async getById(id: number): Promise<Department | null> {
    return this.departmentRepository.findOneBy({ id });
  }

  async getByName(name: string): Promise<Department | null> {
    return this.departmentRepository.findOneBy({ nameKey: toNameKey(name) });
  }

  async getAll(): Promise<Department[]> {
    return this.departmentRepository.find({ order: { name: 'ASC' } });
  }

  async searchByName(keyword: string): Promise<Department[]> {
    return this.departmentRepository
      .createQueryBuilder('department')
      .where("department.name_key LIKE :pattern ESCAPE '\\'", {
        pattern: `%${escapeLike(toNameKey(keyword))}%`,
      })
      .orderBy('department.name', 'ASC')
      .getMany();
  }

  async existsByName(name: string, excludeId?: number): Promise<boolean> {
    const nameKey = toNameKey(name);
    return this.departmentRepository.exists({
      where: excludeId === undefined ? { nameKey } : { nameKey, id: Not(excludeId) },
    });
  }

  async commit(): Promise<number> {
    const changes = this.pending;
    this.pending = [];
    if (changes.length === 0) {
      return 0;
    }

    const progress: { current?: StagedChange } = {};
    try {
      return await this.departmentRepository.manager.transaction(async (manager) => {
        let affected = 0;
        for (const change of changes) {
          progress.current = change;
          affected += await this.apply(manager, change);
        }
        return affected;
      });
    } catch (error) {
      const failed = progress.current;
      if (isUniqueViolation(error) && failed && failed.kind !== 'delete') {
        throw duplicateDepartmentName(failed.department.name);
      }
      throw error;
    }
  }

  private async apply(manager: EntityManager, change: StagedChange): Promise<number> {
    switch (change.kind) {
      case 'insert': {
        const saved = await manager.save(
          manager.create(Department, {
            name: change.department.name,
            nameKey: toNameKey(change.department.name),
            description: change.department.description ?? '',
          }),
        );
        change.department.id = saved.id;
        return 1;
      }
      case 'update': {
        const result = await manager.update(
          Department,
          { id: change.department.id },
          {
            name: change.department.name,
            nameKey: toNameKey(change.department.name),
            description: change.department.description ?? '',
          },
        );
        return result.affected ?? 0;
      }
      case 'delete': {
        const result = await manager.delete(Department, { id: change.id });
        return result.affected ?? 0;
      }
    }
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { validateSync } from 'class-validator';
import { ValidationMode } from '../config/configuration';
import {
  Department,
  DEPARTMENT_DESCRIPTION_MAX_LENGTH,
  DEPARTMENT_NAME_MAX_LENGTH,
} from '../entities/department.entity';
import {
  departmentNotFound,
  DepartmentPersistenceException,
  DepartmentValidationException,
  duplicateDepartmentName,
  isDepartmentError,
} from '../errors/department.exceptions';
import { KafkaProducerService } from '../kafka/kafka-producer.service';
import { DEPARTMENT_REPOSITORY, IDepartmentRepository } from '../repositories/department.repository';

type MutationKind = 'add' | 'update' | 'delete';

const PERSISTENCE_MESSAGES: Record<MutationKind, { noEffect: string; unexpected: string }> = {
  add: {
    noEffect: 'Failed to add department to database.',
    unexpected: 'An unexpected error occurred while adding the department.',
  },
  update: {
    noEffect: 'Failed to update department in database.',
    unexpected: 'An unexpected error occurred while updating the department.',
  },
  delete: {
    noEffect: 'Failed to delete department from database.',
    unexpected: 'An unexpected error occurred while deleting the department.',
  },
};

function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0;
}

@Injectable()
export class DepartmentService {
  private readonly logger = new Logger(DepartmentService.name);
  private readonly validationMode: ValidationMode;

  constructor(
    @Inject(DEPARTMENT_REPOSITORY)
    private readonly departmentRepository: IDepartmentRepository,
    private readonly kafkaProducer: KafkaProducerService,
    configService: ConfigService,
  ) {
    this.validationMode = configService.get<ValidationMode>('departments.validationMode') ?? 'ordered';
  }

  /**
   * Validates and stores a new department. Resolves with the same record,
   * its `id` assigned by storage.
   *
   * @throws DepartmentValidationException when the record is missing or a field is out of range
   * @throws ConflictException when another department already uses the name (case-insensitive)
   * @throws DepartmentPersistenceException when storage fails or reports no inserted row
   */
  async addDepartment(department: Department | null | undefined): Promise<Department> {
    this.logger.log('Starting addDepartment operation');

    const candidate = this.validateInput(department, 'add');

    if (await this.departmentRepository.existsByName(candidate.name)) {
      this.logger.warn(`Attempt to add duplicate department name: ${candidate.name}`);
      throw duplicateDepartmentName(candidate.name);
    }

    candidate.description = candidate.description ?? '';
    await this.persist('add', candidate.name, () => this.departmentRepository.add(candidate));

    this.logger.log(`Added department '${candidate.name}' with ID ${candidate.id}`);
    await this.kafkaProducer.publishEvent('department.created', {
      department_id: candidate.id,
      name: candidate.name,
    });

    return candidate;
  }

  /**
   * Replaces the name and description of an existing department.
   * Keeping the current name never counts as a duplicate.
   *
   * @throws DepartmentValidationException when the record, id or a field is invalid
   * @throws NotFoundException when no department has the given id
   * @throws ConflictException when a different department already uses the name
   * @throws DepartmentPersistenceException when storage fails or reports no updated row
   */
  async updateDepartment(department: Department | null | undefined): Promise<Department> {
    this.logger.log(`Starting updateDepartment operation for ID ${department?.id}`);

    const candidate = this.validateInput(department, 'update');

    const existing = await this.departmentRepository.getById(candidate.id);
    if (!existing) {
      this.logger.warn(`Attempt to update missing department ${candidate.id}`);
      throw departmentNotFound(candidate.id);
    }

    if (await this.departmentRepository.existsByName(candidate.name, candidate.id)) {
      this.logger.warn(`Attempt to update department ${candidate.id} with duplicate name: ${candidate.name}`);
      throw duplicateDepartmentName(candidate.name);
    }

    candidate.description = candidate.description ?? '';
    await this.persist('update', String(candidate.id), () => this.departmentRepository.update(candidate));

    this.logger.log(`Updated department ${candidate.id}`);
    await this.kafkaProducer.publishEvent('department.updated', {
      department_id: candidate.id,
      name: candidate.name,
    });

    return candidate;
  }

  /**
   * @throws DepartmentValidationException when the id is not a positive integer
   * @throws NotFoundException when no department has the given id
   * @throws DepartmentPersistenceException when storage fails or reports no deleted row
   */
  async deleteDepartment(id: number): Promise<void> {
    this.logger.log(`Starting deleteDepartment operation for ID ${id}`);

    this.assertValidId(id);

    const existing = await this.departmentRepository.getById(id);
    if (!existing) {
      this.logger.warn(`Attempt to delete missing department ${id}`);
      throw departmentNotFound(id);
    }

    await this.persist('delete', String(id), async () => {
      if (!(await this.departmentRepository.delete(id))) {
        throw departmentNotFound(id);
      }
    });

    this.logger.log(`Deleted department ${id}`);
    await this.kafkaProducer.publishEvent('department.deleted', {
      department_id: id,
      name: existing.name,
    });
  }

  /** Resolves `null` when no department has this id. */
  async getDepartmentById(id: number): Promise<Department | null> {
    this.assertValidId(id);
    this.logger.debug(`Getting department by ID: ${id}`);
    return this.departmentRepository.getById(id);
  }

  /** Case-insensitive exact match; resolves `null` when nothing matches. */
  async getDepartmentByName(name: string): Promise<Department | null> {
    if (isBlank(name)) {
      throw new DepartmentValidationException(['Department name cannot be null or empty.']);
    }
    this.logger.debug(`Getting department by name: ${name}`);
    return this.departmentRepository.getByName(name);
  }

  async searchDepartmentsByName(keyword: string): Promise<Department[]> {
    if (isBlank(keyword)) {
      throw new DepartmentValidationException(['Search keyword cannot be null or empty.']);
    }
    this.logger.debug(`Searching departments by keyword: ${keyword}`);
    return this.departmentRepository.searchByName(keyword);
  }

  async getAllDepartments(): Promise<Department[]> {
    this.logger.debug('Getting all departments');
    return this.departmentRepository.getAll();
  }

  private validateInput(department: Department | null | undefined, operation: 'add' | 'update'): Department {
    if (!department) {
      this.logger.warn(`${operation}Department called without a department`);
      throw new DepartmentValidationException(['Department is required.']);
    }

    if (operation === 'update') {
      this.assertValidId(department.id);
    }

    const violations =
      this.validationMode === 'annotated'
        ? this.annotationViolations(department)
        : this.firstRuleViolation(department);

    if (violations.length > 0) {
      this.logger.warn(`${operation}Department rejected: ${violations.join('; ')}`);
      throw new DepartmentValidationException(violations);
    }

    return department;
  }

  private firstRuleViolation(department: Department): string[] {
    if (isBlank(department.name)) {
      return ['Department name cannot be null or empty.'];
    }
    if (department.name.length > DEPARTMENT_NAME_MAX_LENGTH) {
      return [`Department name cannot exceed ${DEPARTMENT_NAME_MAX_LENGTH} characters.`];
    }
    if ((department.description ?? '').length > DEPARTMENT_DESCRIPTION_MAX_LENGTH) {
      return [`Department description cannot exceed ${DEPARTMENT_DESCRIPTION_MAX_LENGTH} characters.`];
    }
    return [];
  }

  private annotationViolations(department: Department): string[] {
    const errors = validateSync(Object.assign(new Department(), department));
    return errors.flatMap((error) => Object.values(error.constraints ?? {}));
  }

  private assertValidId(id: number): void {
    if (!Number.isInteger(id) || id <= 0) {
      throw new DepartmentValidationException(['Department ID must be greater than zero.']);
    }
  }

  /**
   * Stages a change, commits it and demands a non-zero row count.
   * Storage errors outside the department taxonomy are wrapped, the original kept as `cause`.
   */
  private async persist(kind: MutationKind, subject: string, stage: () => Promise<unknown>): Promise<void> {
    const messages = PERSISTENCE_MESSAGES[kind];
    try {
      await stage();
      const affectedRows = await this.departmentRepository.commit();
      if (affectedRows === 0) {
        this.logger.warn(`No rows were affected when trying to ${kind} department ${subject}`);
        throw new DepartmentPersistenceException(messages.noEffect);
      }
    } catch (error) {
      if (isDepartmentError(error)) {
        throw error;
      }
      this.logger.error(
        `Unexpected error while trying to ${kind} department ${subject}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new DepartmentPersistenceException(messages.unexpected, error);
    }
  }
}

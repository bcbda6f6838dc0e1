import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';
import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export const DEPARTMENT_NAME_MAX_LENGTH = 100;
export const DEPARTMENT_DESCRIPTION_MAX_LENGTH = 500;

@Entity('departments')
export class Department {
  @PrimaryGeneratedColumn()
  id!: number;

  @MaxLength(DEPARTMENT_NAME_MAX_LENGTH, {
    message: 'Department name must be between 1 and 100 characters.',
  })
  @Matches(/\S/, { message: 'Department name is required.' })
  @Column({ length: DEPARTMENT_NAME_MAX_LENGTH })
  name!: string;

  // Lower-cased name; the unique index enforces case-insensitive uniqueness in storage.
  // Unbounded, since lower-casing can lengthen a name ('İ' becomes 'i̇').
  @Column({ name: 'name_key', type: 'text', unique: true, select: false })
  nameKey?: string;

  @IsOptional()
  @IsString()
  @MaxLength(DEPARTMENT_DESCRIPTION_MAX_LENGTH, {
    message: 'Department description cannot exceed 500 characters.',
  })
  @Column({ length: DEPARTMENT_DESCRIPTION_MAX_LENGTH, default: '' })
  description?: string;
}

export function toNameKey(name: string): string {
  return name.toLowerCase();
}

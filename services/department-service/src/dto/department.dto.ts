import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import {
  Department,
  DEPARTMENT_DESCRIPTION_MAX_LENGTH,
  DEPARTMENT_NAME_MAX_LENGTH,
} from '../entities/department.entity';

export class CreateDepartmentDto {
  @IsString()
  @IsNotEmpty({ message: 'Department name is required' })
  @MaxLength(DEPARTMENT_NAME_MAX_LENGTH, {
    message: 'Department name must be between 1 and 100 characters',
  })
  name!: string;

  @IsString()
  @IsOptional()
  @MaxLength(DEPARTMENT_DESCRIPTION_MAX_LENGTH, {
    message: 'Description cannot exceed 500 characters',
  })
  description?: string;
}

export class UpdateDepartmentDto extends CreateDepartmentDto {}

export class SearchDepartmentsQueryDto {
  @IsString()
  @IsNotEmpty({ message: 'Search keyword is required' })
  keyword!: string;
}

export interface DepartmentResponseDto {
  id: number;
  name: string;
  description: string;
}

export function toDepartmentEntity(dto: CreateDepartmentDto, id = 0): Department {
  const department = new Department();
  department.id = id;
  department.name = dto.name;
  department.description = dto.description ?? '';
  return department;
}

export function toDepartmentResponse(department: Department): DepartmentResponseDto {
  return {
    id: department.id,
    name: department.name,
    description: department.description ?? '',
  };
}

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { DepartmentService } from '../services/department.service';
import {
  CreateDepartmentDto,
  DepartmentResponseDto,
  SearchDepartmentsQueryDto,
  toDepartmentEntity,
  toDepartmentResponse,
  UpdateDepartmentDto,
} from '../dto/department.dto';

@Controller('api/v1/departments')
export class DepartmentController {
  constructor(private readonly departmentService: DepartmentService) {}

  @Post()
  async create(@Body() createDepartmentDto: CreateDepartmentDto): Promise<DepartmentResponseDto> {
    const department = await this.departmentService.addDepartment(toDepartmentEntity(createDepartmentDto));
    return toDepartmentResponse(department);
  }

  @Get()
  async findAll(): Promise<DepartmentResponseDto[]> {
    const departments = await this.departmentService.getAllDepartments();
    return departments.map(toDepartmentResponse);
  }

  @Get('search')
  async search(@Query() query: SearchDepartmentsQueryDto): Promise<DepartmentResponseDto[]> {
    const departments = await this.departmentService.searchDepartmentsByName(query.keyword);
    return departments.map(toDepartmentResponse);
  }

  @Get('by-name/:name')
  async findByName(@Param('name') name: string): Promise<DepartmentResponseDto> {
    const department = await this.departmentService.getDepartmentByName(name);
    if (!department) {
      throw new NotFoundException(`Department with name '${name}' not found`);
    }
    return toDepartmentResponse(department);
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<DepartmentResponseDto> {
    const department = await this.departmentService.getDepartmentById(id);
    if (!department) {
      throw new NotFoundException(`Department with ID ${id} not found`);
    }
    return toDepartmentResponse(department);
  }

  @Put(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateDepartmentDto: UpdateDepartmentDto,
  ): Promise<DepartmentResponseDto> {
    const department = await this.departmentService.updateDepartment(toDepartmentEntity(updateDepartmentDto, id));
    return toDepartmentResponse(department);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.departmentService.deleteDepartment(id);
  }
}

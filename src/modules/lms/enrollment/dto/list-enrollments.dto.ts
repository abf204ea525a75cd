import { Type } from 'class-transformer';
import { IsIn, IsInt, IsMongoId, IsOptional, Max, Min } from 'class-validator';
import { ENROLLMENT_STATUSES, EnrollmentStatus } from '../enrollment-status';

export class ListEnrollmentsDto {
  @IsOptional() @IsMongoId()
  courseId?: string;

  @IsOptional() @IsMongoId()
  learnerId?: string;

  @IsOptional() @IsIn([...ENROLLMENT_STATUSES])
  status?: EnrollmentStatus;

  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(200)
  limit?: number;

  @IsOptional() @Type(() => Number) @IsInt() @Min(0)
  skip?: number;
}

import { Type } from 'class-transformer';
import {
  Allow,
  IsArray,
  IsDefined,
  IsObject,
  IsOptional,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';

// Keys GitHub Actions accepts. Anything else is reported as a typo.

export class WorkflowStep {
  @IsOptional()
  @IsString()
  id?: string;

  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  if?: string;

  @IsOptional()
  @IsString()
  uses?: string;

  @IsOptional()
  @IsString()
  run?: string;

  @IsOptional()
  @IsObject()
  with?: Record<string, unknown>;

  @IsOptional()
  @IsObject()
  env?: Record<string, unknown>;

  @IsOptional()
  @IsString()
  shell?: string;

  @IsOptional()
  @IsString()
  'working-directory'?: string;

  @Allow()
  'continue-on-error'?: unknown;

  @Allow()
  'timeout-minutes'?: unknown;
}

const runsSteps = (job: WorkflowJob) => job.uses === undefined;

/**
 * A job either runs steps on a runner or calls a reusable workflow
 * through `uses`.
 */
export class WorkflowJob {
  @IsOptional()
  @IsString()
  name?: string;

  @ValidateIf(runsSteps)
  @IsDefined()
  'runs-on'?: unknown;

  @ValidateIf(runsSteps)
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => WorkflowStep)
  steps?: WorkflowStep[];

  @IsOptional()
  @IsString()
  uses?: string;

  @IsOptional()
  @IsObject()
  with?: Record<string, unknown>;

  @Allow()
  secrets?: unknown;

  @IsOptional()
  @IsString()
  if?: string;

  @IsOptional()
  @IsObject()
  env?: Record<string, unknown>;

  @Allow()
  needs?: unknown;

  @Allow()
  strategy?: unknown;

  @Allow()
  services?: unknown;

  @Allow()
  container?: unknown;

  @Allow()
  permissions?: unknown;

  @Allow()
  outputs?: unknown;

  @Allow()
  defaults?: unknown;

  @Allow()
  environment?: unknown;

  @Allow()
  concurrency?: unknown;

  @Allow()
  'timeout-minutes'?: unknown;

  @Allow()
  'continue-on-error'?: unknown;
}

export class Workflow {
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  'run-name'?: string;

  @IsDefined()
  on!: unknown;

  // Each job is validated on its own so issues carry the job id
  @IsObject()
  jobs!: Record<string, unknown>;

  @IsOptional()
  @IsObject()
  env?: Record<string, unknown>;

  @Allow()
  permissions?: unknown;

  @Allow()
  concurrency?: unknown;

  @Allow()
  defaults?: unknown;
}

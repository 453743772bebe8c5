import { plainToInstance } from "class-transformer";
import {
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from "class-validator";
import { LogLevel, LogRenderer } from "@logging/value-objects";

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsEnum(LogLevel)
  LOG_LEVEL?: LogLevel;

  @IsOptional()
  @IsEnum(LogRenderer)
  LOG_RENDERER?: LogRenderer;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  LOG_USER_HEADER?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  SERVICE_NAME?: string;
}

/**
 * Validates the raw environment for `ConfigModule.forRoot({ validate })`.
 * Throws with every constraint message when anything is off, which aborts
 * startup before the first request is served.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const normalized: Record<string, unknown> = { ...config };
  for (const key of ["LOG_LEVEL", "LOG_RENDERER"]) {
    const value = config[key];
    if (typeof value === "string") normalized[key] = value.toLowerCase();
  }

  const validated = plainToInstance(EnvironmentVariables, normalized, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment: ${messages.join("; ")}`);
  }

  return validated;
}

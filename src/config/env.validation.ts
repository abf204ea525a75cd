import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

class EnvironmentVariables {
  @IsOptional() @IsInt() @Min(1) @Max(65535)
  PORT?: number;

  @IsOptional() @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsString() @IsNotEmpty()
  MONGO_URL!: string;

  @IsString() @IsNotEmpty()
  JWT_SECRET!: string;

  @IsOptional() @IsString()
  JWT_EXPIRES_IN?: string;

  @IsString() @IsNotEmpty()
  PLATFORM_API_KEY!: string;

  @IsOptional() @IsInt() @Min(1) @Max(100)
  COMPLETION_THRESHOLD?: number;
}

/**
 * Validación del entorno al arrancar (ConfigModule.forRoot({ validate })).
 * Falla con la lista de variables inválidas.
 */
export function validateEnv(config: Record<string, unknown>) {
  const parsed = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(parsed, { skipMissingProperties: false });
  if (errors.length > 0) {
    const detail = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Configuración inválida: ${detail}`);
  }
  return config;
}

import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional } from 'class-validator';
import { Transform, TransformFnParams } from 'class-transformer';

const TRUE_VALUES = new Set(['true', '1']);
const FALSE_VALUES = new Set(['false', '0']);

/**
 * Reads a boolean query flag from the raw query string.
 *
 * Implicit conversion would turn any non-empty string (including "false")
 * into `true`, so the raw value is taken from `obj` instead of `value`.
 * Unrecognised input is passed through for @IsBoolean to reject.
 */
export function parseBooleanFlag({ obj, key }: TransformFnParams): unknown {
  const raw: unknown = obj[key];

  if (typeof raw === 'boolean' || raw === undefined) {
    return raw;
  }
  if (typeof raw === 'string') {
    const normalized = raw.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
  }
  return raw;
}

/**
 * Query parameters for listing the catalog.
 */
export class ListPrintsQueryDto {
  @ApiPropertyOptional({
    description: 'Only return prints with this featured flag',
    example: true,
  })
  @IsOptional()
  @Transform(parseBooleanFlag)
  @IsBoolean({ message: 'featured must be a boolean' })
  featured?: boolean;
}

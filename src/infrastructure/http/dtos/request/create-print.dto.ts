import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

/**
 * Request body for adding a print to the catalog.
 * Field names match the stored document.
 */
export class CreatePrintRequestDto {
  @ApiProperty({ example: 'Sunlit Dunes' })
  @IsString()
  @IsNotEmpty({ message: 'title cannot be empty' })
  title!: string;

  @ApiProperty({ example: 'Ava Linden' })
  @IsString()
  @IsNotEmpty({ message: 'artist cannot be empty' })
  artist!: string;

  @ApiPropertyOptional({ example: 'Soft gradients inspired by desert horizons.' })
  @IsOptional()
  @IsString()
  description?: string;

  @ApiProperty({ example: 49, minimum: 0 })
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'price must be a number' })
  @Min(0, { message: 'price cannot be negative' })
  price!: number;

  @ApiPropertyOptional({ example: '12x18 in' })
  @IsOptional()
  @IsString()
  size?: string;

  @ApiPropertyOptional({ example: 'https://example.com/prints/sunlit-dunes.jpg' })
  @IsOptional()
  @IsString()
  image_url?: string;

  @ApiPropertyOptional({ type: [String], example: ['abstract', 'minimal'] })
  @IsOptional()
  @IsArray()
  @ArrayUnique({ message: 'tags must be unique' })
  @IsString({ each: true })
  tags?: string[];

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  in_stock?: boolean;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  featured?: boolean;
}

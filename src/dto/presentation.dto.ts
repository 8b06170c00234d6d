import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { DEFAULT_TEMPLATE_ID } from '../config/templates.config';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class GenerateOutlineDto {
  @ApiProperty({ description: 'Topic keyword for the presentation', example: 'renewable energy' })
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  keyword!: string;
}

export class GeneratePresentationDto {
  @ApiProperty({ description: 'Deck title, used verbatim on the cover slide' })
  @IsString()
  @IsNotEmpty()
  title!: string;

  @ApiProperty({
    description: "Outline: one section title per line, each followed by its points starting with '-'",
    example: 'Why it matters\n- lower costs\n- cleaner air\n\nNext steps\n- pilot project',
  })
  @IsString()
  content!: string;

  @ApiPropertyOptional({ description: 'Template identifier', default: DEFAULT_TEMPLATE_ID })
  @IsOptional()
  @IsString()
  template?: string = DEFAULT_TEMPLATE_ID;
}

export class TemplateDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty({ description: 'Template file name inside the templates directory' })
  file!: string;

  @ApiProperty({ description: 'Layout index of the cover slide' })
  coverLayout!: number;

  @ApiProperty({ type: [Number], description: 'Layout indices content slides cycle through' })
  contentLayouts!: number[];
}

export class OutlineResponseDto {
  @ApiProperty()
  title!: string;

  @ApiProperty()
  outline!: string;
}

export class GeneratedFileDto {
  @ApiProperty({ example: 'PPT_20240601-120000.pptx' })
  filename!: string;

  @ApiProperty({ example: '/download/PPT_20240601-120000.pptx' })
  url!: string;
}

export class ErrorResponseDto {
  @ApiProperty()
  error!: string;

  @ApiProperty()
  detail!: string;

  @ApiProperty()
  timestamp!: string;
}

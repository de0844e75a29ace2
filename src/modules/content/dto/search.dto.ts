import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString } from 'class-validator';
import { trimString } from './trim-string';

export class SearchDto {
  /** Free-text query. Like "latest AI developments" */
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  public readonly query!: string;
}

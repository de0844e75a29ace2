import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, Matches } from 'class-validator';
import { trimString } from './trim-string';

export class ReadDto {
  /** Page to read. Like https://example.com */
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @Matches(/^https?:\/\//i, {
    message: 'url must start with http:// or https://',
  })
  public readonly url!: string;
}

import { IsArray, IsOptional, Matches } from 'class-validator';

export class OverrideRandomWordsDto {
  @IsOptional()
  @IsArray()
  @Matches(/^\d+$/, { each: true, message: 'randomWords must be non-negative integer strings' })
  randomWords?: string[];
}

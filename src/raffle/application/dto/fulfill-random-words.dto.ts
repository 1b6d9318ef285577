import { ArrayMaxSize, ArrayMinSize, IsArray, IsString, Matches } from 'class-validator';

export class FulfillRandomWordsDto {
  @IsString()
  @Matches(/^\d+$/, { message: 'requestId must be a non-negative integer string' })
  requestId!: string;

  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(500)
  @Matches(/^\d+$/, { each: true, message: 'randomWords must be non-negative integer strings' })
  randomWords!: string[];
}

import { IsNotEmpty, IsString } from "class-validator";

export class FilePathDto {
  @IsString()
  @IsNotEmpty()
  path!: string;
}

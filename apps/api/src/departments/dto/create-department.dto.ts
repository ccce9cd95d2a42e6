import { IsNotEmpty, IsString, MaxLength } from "class-validator";
import { Trim } from "../../common/trim";

export class CreateDepartmentDto {
  @Trim()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;
}

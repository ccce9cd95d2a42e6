import { IsNumber, Min } from "class-validator";

export class SetPlanDto {
  @IsNumber()
  @Min(0)
  value!: number;
}

import {
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateIf,
} from "class-validator";
import {
  BONUS_SCHEME_KINDS,
  BonusSchemeKind,
  PAYMENT_SCHEME_KINDS,
  PaymentSchemeKind,
} from "../../core";
import { Trim } from "../../common/trim";

export class CreateEmployeeDto {
  @Trim()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @IsOptional()
  @Trim()
  @IsString()
  position?: string;

  @Trim()
  @IsString()
  @IsNotEmpty()
  departmentName!: string;

  @IsNumber()
  @Min(0)
  baseSalary!: number;

  @IsIn(PAYMENT_SCHEME_KINDS, {
    message: `paymentScheme must be one of ${PAYMENT_SCHEME_KINDS.join(", ")}`,
  })
  paymentScheme!: PaymentSchemeKind;

  @IsIn(BONUS_SCHEME_KINDS, {
    message: `bonusScheme must be one of ${BONUS_SCHEME_KINDS.join(", ")}`,
  })
  bonusScheme!: BonusSchemeKind;

  @ValidateIf((dto: CreateEmployeeDto) => dto.bonusScheme === "FIXED")
  @IsNumber()
  @Min(0)
  bonusAmount?: number;
}

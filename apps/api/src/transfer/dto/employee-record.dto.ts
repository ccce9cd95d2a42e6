import { Type } from "class-transformer";
import {
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Min,
} from "class-validator";
import {
  BONUS_SCHEME_KINDS,
  BonusSchemeKind,
  MonthlyFigures,
  PAYMENT_SCHEME_KINDS,
  PaymentSchemeKind,
} from "../../core";
import { Trim } from "../../common/trim";

/**
 * One employee as stored in JSON and CSV files. CSV cells arrive as strings,
 * hence the numeric conversions.
 */
export class EmployeeRecordDto {
  @Trim()
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @Trim()
  @IsString()
  position?: string;

  @Trim()
  @IsString()
  @IsNotEmpty()
  department!: string;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  base_salary!: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  bonus?: number;

  @IsOptional()
  @IsIn(PAYMENT_SCHEME_KINDS)
  payment_scheme?: PaymentSchemeKind;

  @IsOptional()
  @IsIn(BONUS_SCHEME_KINDS)
  bonus_scheme?: BonusSchemeKind;

  @IsOptional()
  @IsObject()
  production?: MonthlyFigures;
}

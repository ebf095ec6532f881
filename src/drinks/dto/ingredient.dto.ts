import { IsNotEmpty, IsNumber, IsString } from 'class-validator';

/**
 * One recipe entry as submitted by a client.
 * Validated by DrinksService before anything is written.
 */
export class IngredientDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  color!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  parts!: number;
}

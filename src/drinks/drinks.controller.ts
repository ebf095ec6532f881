import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Patch,
  Post,
} from '@nestjs/common';
import { Claims, RequiresAuth } from '../auth';
import type { TokenClaims } from '../auth';
import { DrinksService } from './drinks.service';
import { DrinkPermission } from './drinks.permissions';
import type { DrinkPayload } from './dto/drink-payload.dto';
import { DrinkLongView, DrinkShortView } from './dto/drink-view.dto';
import type {
  DeleteDrinkResponse,
  DrinksResponse,
} from './dto/drinks-response.dto';
import { NoDrinksFoundException } from './exceptions/drink.exceptions';
import { DrinkIdPipe } from './pipes/drink-id.pipe';
import { DrinkPayloadPipe } from './pipes/drink-payload.pipe';

/**
 * REST controller for the drinks menu.
 *
 * Routes:
 *   GET    /drinks         — public menu (short projection)
 *   GET    /drinks-detail  — full recipes          (get:drinks-detail)
 *   POST   /drinks         — add a drink           (post:drinks)
 *   PATCH  /drinks/:id     — change title/recipe   (patch:drinks)
 *   DELETE /drinks/:id     — remove a drink        (delete:drinks)
 *
 * Permission guards run before body and id parsing, so an unauthorized
 * request is rejected before its payload is looked at.
 */
@Controller()
export class DrinksController {
  private readonly logger = new Logger(DrinksController.name);

  constructor(private readonly drinksService: DrinksService) {}

  /**
   * Error responses:
   *   404 — the menu is empty
   *   422 — database failure
   */
  @Get('drinks')
  async listDrinks(): Promise<DrinksResponse<DrinkShortView>> {
    const drinks = await this.drinksService.list();
    if (drinks.length === 0) {
      throw new NoDrinksFoundException();
    }

    return { success: true, drinks: drinks.map(DrinkShortView.fromEntity) };
  }

  @Get('drinks-detail')
  @RequiresAuth(DrinkPermission.READ_DETAIL)
  async listDrinkDetails(): Promise<DrinksResponse<DrinkLongView>> {
    const drinks = await this.drinksService.list();
    if (drinks.length === 0) {
      throw new NoDrinksFoundException();
    }

    return { success: true, drinks: drinks.map(DrinkLongView.fromEntity) };
  }

  /**
   * Accepts `{ title, recipe }` as JSON, a urlencoded form or a raw text body.
   * Answers 200 with the created drink.
   */
  @Post('drinks')
  @RequiresAuth(DrinkPermission.CREATE)
  @HttpCode(HttpStatus.OK)
  async createDrink(
    @Body(DrinkPayloadPipe) payload: DrinkPayload,
    @Claims() claims: TokenClaims,
  ): Promise<DrinksResponse<DrinkLongView>> {
    this.logger.log(`Create drink requested by ${claims.sub ?? 'unknown subject'}`);

    const drink = await this.drinksService.create(payload);
    return { success: true, drinks: [DrinkLongView.fromEntity(drink)] };
  }

  @Patch('drinks/:id')
  @RequiresAuth(DrinkPermission.UPDATE)
  async updateDrink(
    @Param('id', DrinkIdPipe) id: number,
    @Body(DrinkPayloadPipe) payload: DrinkPayload,
    @Claims() claims: TokenClaims,
  ): Promise<DrinksResponse<DrinkLongView>> {
    this.logger.log(
      `Update of drink ${id} requested by ${claims.sub ?? 'unknown subject'}`,
    );

    const drink = await this.drinksService.update(id, payload);
    return { success: true, drinks: [DrinkLongView.fromEntity(drink)] };
  }

  @Delete('drinks/:id')
  @RequiresAuth(DrinkPermission.DELETE)
  async deleteDrink(
    @Param('id', DrinkIdPipe) id: number,
    @Claims() claims: TokenClaims,
  ): Promise<DeleteDrinkResponse> {
    this.logger.log(
      `Deletion of drink ${id} requested by ${claims.sub ?? 'unknown subject'}`,
    );

    const deleted = await this.drinksService.remove(id);
    return { success: true, delete: deleted };
  }
}

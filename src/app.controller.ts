import { Controller, Get } from '@nestjs/common';

export const WELCOME_MESSAGE = 'Welcome to the Drinks Menu API';

@Controller()
export class AppController {
  @Get()
  welcome(): string {
    return WELCOME_MESSAGE;
  }
}

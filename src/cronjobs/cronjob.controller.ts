import { Controller, Get } from '@nestjs/common';

@Controller('cronjob')
export class CronjobController {

  @Get()
  status(): { status: number; message: string } {
    return { status: 200, message: 'Ok' };
  }
}

import {
  BadRequestException,
  Controller,
  DefaultValuePipe,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';

// biome-ignore lint/style/useImportType: NestJS DI needs the runtime reference
import { DiscoveryService } from '@/modules/discovery/application/services/discovery.service';

@Controller('discovery')
export class DiscoveryController {
  constructor(private readonly discovery: DiscoveryService) {}

  /**
   * Query params:
   * - city (required)
   * - max (optional, default 50)
   * - provider (optional): serpapi | brave, default serpapi
   */
  @Post()
  async run(
    @Query('city') city: string | undefined,
    @Query('max', new DefaultValuePipe(50), ParseIntPipe) max: number,
    @Query('provider', new DefaultValuePipe('serpapi')) provider: string,
  ) {
    if (!city?.trim()) throw new BadRequestException('city is required');
    if (max < 1) throw new BadRequestException('max must be at least 1');
    return this.discovery.run({ city: city.trim(), max, provider });
  }
}

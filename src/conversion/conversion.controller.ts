import {
  Body,
  Controller,
  HttpCode,
  Post,
  Res,
  StreamableFile,
  UploadedFiles,
  UseInterceptors,
  ValidationPipe,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnyFilesInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';
import { ConversionService } from './conversion.service';
import { ConvertFormDto } from './dto/convert-form.dto';
import { createRequestSignal } from '../common/utils/request-signal';
import { toPositiveInt } from '../common/utils/config.utils';

@Controller('forms/office')
export class ConversionController {
  private readonly timeoutMs: number;

  constructor(
    private readonly conversionService: ConversionService,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = toPositiveInt(
      this.configService.get('CONVERSION_TIMEOUT_MS'),
      30000,
    );
  }

  /**
   * Convert office documents to PDF.
   * One output is returned as is; several come back as a zip archive.
   */
  @Post('convert')
  @HttpCode(200)
  @UseInterceptors(AnyFilesInterceptor())
  async convert(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Body(new ValidationPipe({ whitelist: true, transform: true }))
    form: ConvertFormDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const request = createRequestSignal(res, this.timeoutMs);

    try {
      const output = await this.conversionService.convert(
        files ?? [],
        form,
        request.signal,
      );

      // Adds an RFC 5987 filename* next to a Latin-1 fallback when needed
      res.attachment(output.fileName);
      res.set({
        'Content-Type': output.contentType,
        'Content-Length': output.body.length.toString(),
      });

      return new StreamableFile(output.body);
    } finally {
      request.dispose();
    }
  }
}

import { Controller, Get, Header } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';

export const OPENAPI_JSON_PATH = '/openapi.json';

const REDOC_BUNDLE_URL =
  'https://cdn.jsdelivr.net/npm/redoc@2/bundles/redoc.standalone.js';

export function renderRedocPage(specUrl: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<title>S3 Health Check API - ReDoc</title>',
    '<meta charset="utf-8"/>',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    '</head>',
    '<body>',
    `<redoc spec-url="${specUrl}"></redoc>`,
    `<script src="${REDOC_BUNDLE_URL}"></script>`,
    '</body>',
    '</html>',
  ].join('\n');
}

@ApiExcludeController()
@Controller('redoc')
export class RedocController {
  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  page(): string {
    return renderRedocPage(OPENAPI_JSON_PATH);
  }
}

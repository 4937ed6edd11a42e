import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, OpenAPIObject, SwaggerModule } from '@nestjs/swagger';
import { OPENAPI_JSON_PATH } from './redoc.controller';

export function buildOpenApiDocument(app: INestApplication): OpenAPIObject {
  const config = new DocumentBuilder()
    .setTitle('S3 Health Check API')
    .setDescription(
      'API for checking the health of S3 buckets by verifying the age of the newest object and reporting storage usage',
    )
    .setVersion('1.0.0')
    .setLicense('GPLv3', 'https://www.gnu.org/licenses/gpl-3.0.html')
    .build();
  return SwaggerModule.createDocument(app, config);
}

export function setupOpenApi(app: INestApplication): void {
  SwaggerModule.setup('docs', app, buildOpenApiDocument(app), {
    jsonDocumentUrl: OPENAPI_JSON_PATH,
  });
}

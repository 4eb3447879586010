import { DocumentBuilder, SwaggerCustomOptions } from '@nestjs/swagger';

/**
 * OpenAPI document for the identity API, served at /api/docs by main.ts.
 */
export function buildSwaggerConfig() {
  return new DocumentBuilder()
    .setTitle('Identity API')
    .setDescription(
      'Account registration, sign-in, single-use token flows and account administration. ' +
      'Authenticated endpoints require a Bearer access token obtained from POST /api/auth/login.',
    )
    .setVersion('1.0.0')
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        description: 'Access token from /api/auth/login or /api/auth/refresh',
      },
      'JWT-auth',
    )
    .addTag('Authentication', 'Registration, login, external identities, email verification and password flows')
    .addTag('Admin - Accounts', 'Account search, statistics, status and role administration')
    .build();
}

export const swaggerCustomOptions: SwaggerCustomOptions = {
  swaggerOptions: {
    persistAuthorization: true,
    tagsSorter: 'alpha',
    operationsSorter: 'method',
  },
  customSiteTitle: 'Identity API Docs',
};

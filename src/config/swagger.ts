import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

export function setupSwagger(port: number): object {
  // Route docs live beside the compiled or source route files
  const routesGlob = path.join(__dirname, '..', 'routes', `*${path.extname(__filename)}`);

  const options: swaggerJsdoc.Options = {
    definition: {
      openapi: '3.0.0',
      info: {
        title: process.env.SWAGGER_TITLE || 'Token Lifecycle API',
        version: process.env.SWAGGER_VERSION || '1.0.0',
        description: process.env.SWAGGER_DESCRIPTION || 'Issues, rotates, validates and revokes access/refresh token pairs',
      },
      servers: [
        {
          url: process.env.API_URL || `http://localhost:${port}`,
        },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
      },
    },
    apis: [routesGlob],
  };

  return swaggerJsdoc(options);
}

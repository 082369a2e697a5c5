import { INestApplication, ValidationPipe } from '@nestjs/common';

/** Request handling shared by the server and the HTTP tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true, forbidNonWhitelisted: true }));
  return app;
}

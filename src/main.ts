import 'reflect-metadata';
import {NestFactory} from '@nestjs/core';
import {AppModule} from './app.module';
import {JsonLoggerService, LoggerFactory} from 'json-logger-service';
import {MicroserviceOptions, Transport} from "@nestjs/microservices";
import {join} from "path";

async function bootstrap() {

  const app = await NestFactory.create(AppModule);

  app.useLogger(new JsonLoggerService('Recommendation service'));

  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.GRPC,
    options: {
      url: `${process.env.GRPC_HOST ?? '0.0.0.0'}:${process.env.GRPC_PORT ?? '5005'}`,
      package: 'recommendations',
      protoPath: join(__dirname, '../proto/recommendations.proto'),
    }
  });

  await app.startAllMicroservices();

  await app.listen(parseInt(process.env.HTTP_PORT ?? '5004', 10));
}

bootstrap().catch((e) => {
  LoggerFactory.createLogger('bootstrap').error(' error starting recommendation service ' + String(e));
  process.exit(1);
});

import { Global, Module } from '@nestjs/common';
import { JwtModule, JwtModuleOptions } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PaymentSignatureService } from './services/payment-signature.service';
import { AuthGuard } from './guards/auth.guard';

/**
 * CommonModule provides shared services across the application
 *
 * - PaymentSignatureService: verifies provider signatures
 * - JwtModule: verifies bearer tokens in AuthGuard. Tokens are issued by
 *   the identity service, so no sign options are configured here.
 */
@Global()
@Module({
  imports: [
    JwtModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService): JwtModuleOptions => ({
        secret: configService.get<string>('JWT_SECRET'),
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [PaymentSignatureService, AuthGuard],
  exports: [JwtModule, PaymentSignatureService, AuthGuard],
})
export class CommonModule {}

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookingModule } from '../booking/booking.module';
import { HoldModule } from '../hold/hold.module';
import { NotificationModule } from '../notification/notification.module';
import { HttpPaymentGateway } from './gateway/http-payment.gateway';
import {
  PAYMENT_GATEWAY,
  PaymentGatewayAdapter,
} from './gateway/payment-gateway.interface';
import { SandboxPaymentGateway } from './gateway/sandbox-payment.gateway';
import { PaymentController } from './payment.controller';
import { PaymentOrderService } from './payment-order.service';
import { PaymentVerifier } from './payment-verifier.service';

/**
 * PaymentModule handles provider orders and payment settlement
 *
 * PAYMENT_GATEWAY_MODE selects the gateway: `http` talks to the provider,
 * `sandbox` issues local order ids.
 */
@Module({
  imports: [BookingModule, HoldModule, NotificationModule],
  controllers: [PaymentController],
  providers: [
    HttpPaymentGateway,
    SandboxPaymentGateway,
    {
      provide: PAYMENT_GATEWAY,
      useFactory: (
        configService: ConfigService,
        httpGateway: HttpPaymentGateway,
        sandboxGateway: SandboxPaymentGateway,
      ): PaymentGatewayAdapter =>
        configService.get<string>('PAYMENT_GATEWAY_MODE') === 'http'
          ? httpGateway
          : sandboxGateway,
      inject: [ConfigService, HttpPaymentGateway, SandboxPaymentGateway],
    },
    PaymentOrderService,
    PaymentVerifier,
  ],
  exports: [PaymentVerifier, PaymentOrderService],
})
export class PaymentModule {}

export * from './confirm-payment.dto';

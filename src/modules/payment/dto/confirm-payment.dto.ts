import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * Fields the provider checkout hands back to the client on success
 *
 * @example
 * ```json
 * {
 *   "external_order_id": "order_4f2c9e1ab7d04e55",
 *   "external_payment_id": "pay_8d31c0f2e6a94b17",
 *   "signature": "9ef4dffbfd84f1318f6739a3ce19f9d85851857ae648f114332d8401e0949a3d"
 * }
 * ```
 */
export class ConfirmPaymentDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  external_order_id!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  external_payment_id!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  signature!: string;
}

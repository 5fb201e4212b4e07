export * from './booking.errors';

export * from './hold-seats.dto';

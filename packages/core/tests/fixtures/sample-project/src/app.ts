import { Calculator } from './calculator';

export function main(): number {
  const calculator = new Calculator();
  return calculator.square(3);
}

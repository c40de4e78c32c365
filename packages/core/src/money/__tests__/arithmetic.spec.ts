import { describe, it, expect } from 'vitest';
import { MoneyAmount } from '../money-amount.js';
import { FormatError, MoneyTypeError, MoneyValueError } from '../../errors/index.js';

describe('MoneyAmount arithmetic', () => {
  describe('add and subtract', () => {
    it('adds per denomination without normalizing', () => {
      const sum = new MoneyAmount(5, 2, 10).add(new MoneyAmount(1, 16, 20));
      expect(sum.toJSON()).toEqual({ galleons: 6, sickles: 18, knuts: 30 });
    });

    it('accepts knut counts and quantity strings', () => {
      const amount = new MoneyAmount(5, 2, 10);
      expect(amount.add(10).toJSON()).toEqual({ galleons: 5, sickles: 2, knuts: 20 });
      expect(amount.add('1g, -10k').toJSON()).toEqual({ galleons: 6, sickles: 2, knuts: 0 });
    });

    it('is commutative', () => {
      const a = new MoneyAmount(5, 2, 10);
      const b = new MoneyAmount(-1, 30, 4);
      expect(a.add(b).toJSON()).toEqual(b.add(a).toJSON());
      expect(a.add(b).equals(b.add(a))).toBe(true);
    });

    it('keeps negative denominations after subtracting', () => {
      expect(new MoneyAmount(0, 1, 0).subtract(10).toJSON()).toEqual({ galleons: 0, sickles: 1, knuts: -10 });
    });

    it('rejects sums whose total leaves the safe integer range', () => {
      const amount = new MoneyAmount(2 ** 44);
      expect(() => amount.add(amount)).toThrow(MoneyValueError);
      expect(() => amount.addInPlace(`${2 ** 44}g`)).toThrow(MoneyValueError);
      expect(amount.toJSON()).toEqual({ galleons: 2 ** 44, sickles: 0, knuts: 0 });
    });

    it('subtractFrom computes the reflected difference', () => {
      expect(new MoneyAmount(0, 0, 10).subtractFrom('1s').toJSON()).toEqual({
        galleons: 0,
        sickles: 1,
        knuts: -10,
      });
    });

    it('is anti-commutative', () => {
      const a = new MoneyAmount(5, 2, 10);
      const b = new MoneyAmount(1, 7, 30);
      expect(a.subtract(b).toJSON()).toEqual(b.subtract(a).negate().toJSON());
    });

    it('rejects unsupported operands before doing anything', () => {
      const amount = new MoneyAmount(1, 2, 3);
      expect(() => Reflect.apply(amount.add, amount, [null])).toThrow(MoneyTypeError);
      expect(() => Reflect.apply(amount.subtract, amount, [[1]])).toThrow(
        'subtract expects a MoneyAmount, number or quantity string, got Array'
      );
      expect(() => amount.add('5x')).toThrow(FormatError);
    });
  });

  describe('negate', () => {
    it('flips every sign', () => {
      expect(new MoneyAmount(5, -2, 10).negate().toJSON()).toEqual({ galleons: -5, sickles: 2, knuts: -10 });
    });

    it('does not produce negative zero', () => {
      const negated = new MoneyAmount().negate();
      expect(Object.is(negated.galleons, 0)).toBe(true);
      expect(Object.is(negated.knuts, 0)).toBe(true);
    });
  });

  describe('multiply', () => {
    it('scales each denomination by a whole-number factor', () => {
      expect(new MoneyAmount(5, 2, 10).multiply(3).toJSON()).toEqual({ galleons: 15, sickles: 6, knuts: 30 });
      expect(new MoneyAmount(5, 2, 10).multiply(-1).toJSON()).toEqual({ galleons: -5, sickles: -2, knuts: -10 });
      expect(new MoneyAmount(5, 2, 10).multiply(2.0).toJSON()).toEqual({ galleons: 10, sickles: 4, knuts: 20 });
    });

    it('scales the total value by a fractional factor and normalizes', () => {
      const amount = new MoneyAmount(1, 25, 35);
      expect(amount.value).toBe(1253);
      expect(amount.multiply(2.35).toJSON()).toEqual({ galleons: 5, sickles: 16, knuts: 15 });
    });

    it('truncates fractional results toward zero', () => {
      expect(new MoneyAmount(0, 0, 3).multiply(0.5).toJSON()).toEqual({ galleons: 0, sickles: 0, knuts: 1 });
      expect(new MoneyAmount(0, 0, 3).multiply(-0.5).toJSON()).toEqual({ galleons: -1, sickles: 16, knuts: 28 });
    });

    it('rejects non-numeric and non-finite factors', () => {
      const amount = new MoneyAmount(1, 2, 3);
      expect(() => Reflect.apply(amount.multiply, amount, ['2'])).toThrow('multiplier must be a number, got string');
      expect(() => Reflect.apply(amount.multiply, amount, [amount])).toThrow(MoneyTypeError);
      expect(() => amount.multiply(Number.NaN)).toThrow('multiplier must be a finite number, got NaN');
    });

    it('rejects results beyond the safe integer range', () => {
      expect(() => new MoneyAmount(2 ** 40).multiply(2 ** 13)).toThrow(MoneyValueError);
      expect(() => new MoneyAmount(2 ** 44).multiply(2)).toThrow(MoneyValueError);
    });
  });

  describe('division', () => {
    it('floor-divides the total value and normalizes', () => {
      const amount = new MoneyAmount(5, 2, 10);
      expect(amount.floorDivide(2).toJSON()).toEqual({ galleons: 2, sickles: 9, knuts: 19 });
      expect(amount.divide(2).toJSON()).toEqual({ galleons: 2, sickles: 9, knuts: 19 });
    });

    it('rounds toward negative infinity', () => {
      expect(new MoneyAmount(5, 2, 10).floorDivide(-2).toJSON()).toEqual({ galleons: -3, sickles: 7, knuts: 9 });
    });

    it('accepts fractional divisors', () => {
      expect(new MoneyAmount(5, 2, 10).floorDivide(2.5).toJSON()).toEqual({ galleons: 2, sickles: 0, knuts: 27 });
    });

    it('rejects zero, non-numbers and amounts as divisors', () => {
      const amount = new MoneyAmount(5, 2, 10);
      expect(() => amount.floorDivide(0)).toThrow('floorDivide: division by zero');
      expect(() => amount.modulo(0)).toThrow(MoneyValueError);
      expect(() => Reflect.apply(amount.divide, amount, [amount])).toThrow(
        'divide: cannot divide by a MoneyAmount; divisor must be a number'
      );
      expect(() => Reflect.apply(amount.divide, amount, ['2'])).toThrow(MoneyTypeError);
    });
  });

  describe('modulo and divmod', () => {
    it('takes the remainder of the total value, normalized', () => {
      expect(new MoneyAmount(5, 2, 10).modulo(7).toJSON()).toEqual({ galleons: 0, sickles: 0, knuts: 6 });
      expect(new MoneyAmount(5, 2, 10).modulo(1000).toJSON()).toEqual({ galleons: 1, sickles: 1, knuts: 11 });
    });

    it('gives the remainder the sign of the divisor', () => {
      expect(new MoneyAmount(5, 2, 10).modulo(-7).value).toBe(-1);
    });

    it('divmod pairs the quotient with the remainder', () => {
      const [quotient, remainder] = new MoneyAmount(5, 2, 10).divmod(1000);
      expect(quotient.toJSON()).toEqual({ galleons: 0, sickles: 0, knuts: 2 });
      expect(remainder.toJSON()).toEqual({ galleons: 1, sickles: 1, knuts: 11 });
    });

    it('reconstructs the original value from quotient and remainder', () => {
      const amounts = [new MoneyAmount(5, 2, 10), new MoneyAmount(-7, 3, 100), new MoneyAmount(0, 0, 1)];
      for (const amount of amounts) {
        for (const divisor of [1, 2, 3, 7, 29, 493, 1000, -1, -7, -1000]) {
          const [quotient, remainder] = amount.divmod(divisor);
          expect(quotient.multiply(divisor).add(remainder).value, `${amount} / ${divisor}`).toBe(amount.value);
        }
      }
    });
  });

  describe('power', () => {
    it('raises the total value and normalizes', () => {
      expect(new MoneyAmount(0, 0, 3).power(2).toJSON()).toEqual({ galleons: 0, sickles: 0, knuts: 9 });
      expect(new MoneyAmount(0, 1, 0).power(2).toJSON()).toEqual({ galleons: 1, sickles: 12, knuts: 0 });
      expect(new MoneyAmount(5, 2, 10).power(0).toJSON()).toEqual({ galleons: 0, sickles: 0, knuts: 1 });
    });

    it('truncates fractional results', () => {
      expect(new MoneyAmount(0, 0, 30).power(0.5).toJSON()).toEqual({ galleons: 0, sickles: 0, knuts: 5 });
      expect(new MoneyAmount(0, 0, 4).power(-1).toJSON()).toEqual({ galleons: 0, sickles: 0, knuts: 0 });
    });

    it('rejects unrepresentable results', () => {
      expect(() => new MoneyAmount().power(-1)).toThrow(MoneyValueError);
      expect(() => new MoneyAmount(1000).power(3)).toThrow(MoneyValueError);
      expect(() => Reflect.apply(MoneyAmount.prototype.power, new MoneyAmount(1), ['2'])).toThrow(
        'exponent must be a number, got string'
      );
    });
  });

  describe('in-place operations', () => {
    it('update the receiver and return it', () => {
      const amount = new MoneyAmount(5, 2, 10);
      expect(amount.addInPlace('1g')).toBe(amount);
      expect(amount.toJSON()).toEqual({ galleons: 6, sickles: 2, knuts: 10 });
      amount.subtractInPlace(10);
      expect(amount.toJSON()).toEqual({ galleons: 6, sickles: 2, knuts: 0 });
      amount.multiplyInPlace(2);
      expect(amount.toJSON()).toEqual({ galleons: 12, sickles: 4, knuts: 0 });
      amount.floorDivideInPlace(2);
      expect(amount.toJSON()).toEqual({ galleons: 6, sickles: 2, knuts: 0 });
      amount.moduloInPlace(1000);
      expect(amount.toJSON()).toEqual({ galleons: 0, sickles: 0, knuts: 16 });
      amount.powerInPlace(2);
      expect(amount.toJSON()).toEqual({ galleons: 0, sickles: 8, knuts: 24 });
      amount.divideInPlace(2);
      expect(amount.toJSON()).toEqual({ galleons: 0, sickles: 4, knuts: 12 });
    });

    it('leave the receiver untouched when the operand is rejected', () => {
      const amount = new MoneyAmount(5, 2, 10);
      expect(() => amount.addInPlace('5x')).toThrow(FormatError);
      expect(() => Reflect.apply(amount.subtractInPlace, amount, [{}])).toThrow(MoneyTypeError);
      expect(() => amount.multiplyInPlace(Infinity)).toThrow(MoneyValueError);
      expect(() => amount.floorDivideInPlace(0)).toThrow(MoneyValueError);
      expect(() => amount.powerInPlace(10)).toThrow(MoneyValueError);
      expect(amount.toJSON()).toEqual({ galleons: 5, sickles: 2, knuts: 10 });
    });

    it('are visible through every reference to the same instance', () => {
      const amount = new MoneyAmount(1, 0, 0);
      const alias = amount;
      alias.addInPlace('1s');
      expect(amount.toJSON()).toEqual({ galleons: 1, sickles: 1, knuts: 0 });
    });
  });
});

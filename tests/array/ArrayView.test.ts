import { ConfigurationError, IndexOutOfRangeError } from '@fixedq/core';
import { FixedArray, ReadonlyArrayView } from '@fixedq/array';

describe('FixedArray', () => {
  const numbered = (length: number): FixedArray<number> => {
    const array = FixedArray.filled(length, 0);
    array.enumerate((_, i) => array.set(i, i * 10));
    return array;
  };

  describe('filled', () => {
    it('should fill every element with the default value', () => {
      const array = FixedArray.filled(3, 'x');

      expect(array.length).toBe(3);
      expect([...array]).toEqual(['x', 'x', 'x']);
    });

    it('should reject a non-positive length', () => {
      expect(() => FixedArray.filled(0, 'x')).toThrow(ConfigurationError);
      expect(() => FixedArray.filled(0, 'x')).toThrow('Invalid length 0: length must be greater than 0');
    });
  });

  describe('at / set', () => {
    it('should read back written elements', () => {
      const array = numbered(4);

      expect(array.at(0)).toBe(0);
      expect(array.at(3)).toBe(30);
    });

    it('should throw IndexOutOfRangeError outside the bounds', () => {
      const array = numbered(4);

      expect(() => array.at(4)).toThrow(IndexOutOfRangeError);
      expect(() => array.at(-1)).toThrow('Index out of range (index -1, length 4)');
      expect(() => array.at(1.5)).toThrow(IndexOutOfRangeError);
      expect(() => array.set(4, 1)).toThrow(IndexOutOfRangeError);
    });
  });

  describe('enumerate', () => {
    it('should visit each element with its index', () => {
      const visit = jest.fn();
      numbered(3).enumerate(visit);

      expect(visit.mock.calls).toEqual([
        [0, 0],
        [10, 1],
        [20, 2],
      ]);
    });
  });

  describe('zip', () => {
    it('should pair elements of equal-length views', () => {
      const pairs: string[] = [];
      const names = FixedArray.filled(3, '');
      names.set(0, 'a');
      names.set(1, 'b');
      names.set(2, 'c');

      numbered(3).zip(names, (n, name, i) => pairs.push(`${i}:${name}=${n}`));

      expect(pairs).toEqual(['0:a=0', '1:b=10', '2:c=20']);
    });

    it('should reject views of different lengths', () => {
      expect(() => numbered(3).zip(numbered(2), () => {})).toThrow(IndexOutOfRangeError);
    });
  });

  describe('view', () => {
    it('should expose a sub-range without copying', () => {
      const array = numbered(5);
      const middle = array.view(1, 4);

      expect(middle.length).toBe(3);
      expect([...middle]).toEqual([10, 20, 30]);

      middle.set(0, 99);
      expect(array.at(1)).toBe(99);

      array.set(3, 77);
      expect(middle.at(2)).toBe(77);
    });

    it('should index nested views relative to their parent view', () => {
      const array = numbered(6);
      const inner = array.view(1, 5).view(2, 4);

      expect([...inner]).toEqual([30, 40]);
      expect(() => inner.at(2)).toThrow(IndexOutOfRangeError);
    });

    it('should reject ranges outside the view or of no elements', () => {
      const array = numbered(4);

      expect(() => array.view(-1, 2)).toThrow('View start out of range (index -1, length 4)');
      expect(() => array.view(0, 5)).toThrow('View end out of range (index 5, length 4)');
      expect(() => array.view(2, 2)).toThrow(IndexOutOfRangeError);
      expect(() => array.view(3, 1)).toThrow(IndexOutOfRangeError);
    });
  });

  describe('ReadonlyArrayView constructor', () => {
    it('should wrap existing storage without copying', () => {
      const data = [1, 2, 3];
      const view = new ReadonlyArrayView(data, 1, 2);
      data[2] = 9;

      expect([...view]).toEqual([2, 9]);
    });

    it('should reject a fractional offset', () => {
      expect(() => new ReadonlyArrayView([1, 2, 3], 0.5, 1)).toThrow(
        'View offset must be an integer (index 0.5, length 3)',
      );
    });

    it('should reject a fractional or non-positive length', () => {
      expect(() => new ReadonlyArrayView([1, 2, 3], 0, 1.5)).toThrow(ConfigurationError);
      expect(() => new ReadonlyArrayView([1, 2, 3], 0, 0)).toThrow(
        'View length must be a positive integer, got 0',
      );
    });

    it('should reject a window past the end of the storage', () => {
      expect(() => new ReadonlyArrayView([1, 2, 3], 2, 2)).toThrow(IndexOutOfRangeError);
    });
  });

  describe('readonlyView', () => {
    it('should see writes made through the owner', () => {
      const array = numbered(4);
      const tail = array.readonlyView(2, 4);

      array.set(2, 5);

      expect(tail).toBeInstanceOf(ReadonlyArrayView);
      expect('set' in tail).toBe(false);
      expect([...tail]).toEqual([5, 30]);
      expect([...tail.readonlyView(1, 2)]).toEqual([30]);
    });
  });
});

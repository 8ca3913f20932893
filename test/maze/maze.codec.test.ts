import { config } from '../../src/config';
import Maze from '../../src/maze/maze';
import {
  decodeMaze,
  encodeMaze,
  tryDecodeMaze,
} from '../../src/maze/maze.codec';
import { MalformedEncodingError } from '../../src/maze/maze.errors';
import { generateMaze } from '../../src/runner';

describe('Maze codec', () => {
  describe('encodeMaze()', () => {
    describe('Scenario: 2x2 perimeter loop', () => {
      const maze = new Maze(2, 2, [0b0110, 0b1001, 0b0011, 0b1100]);

      it('writes the width then packed nibbles', () => {
        // Act
        const bytes = encodeMaze(maze);
        // Assert
        expect(Array.from(bytes)).toEqual([0x00, 0x02, 0b01101001, 0b00111100]);
      });
    });

    describe('Scenario: odd cell count', () => {
      it('pads the final low nibble with zero', () => {
        // Arrange
        const maze = new Maze(3, 1, [0b0010, 0b1010, 0b1000]);
        // Act
        const bytes = encodeMaze(maze);
        // Assert
        expect(Array.from(bytes)).toEqual([0x00, 0x03, 0x2a, 0x80]);
      });
    });

    describe('Scenario: width above 255', () => {
      it('stores the width big-endian', () => {
        // Act
        const bytes = encodeMaze(new Maze(0x0102, 1));
        // Assert
        expect([bytes[0], bytes[1], bytes.length]).toEqual([0x01, 0x02, 2 + 129]);
      });
    });

    it('is reachable from Maze#toBytes', () => {
      // Arrange
      const maze = new Maze(1, 1, [0b0001]);
      // Act & Assert
      expect(Array.from(maze.toBytes())).toEqual([0x00, 0x01, 0x10]);
    });
  });

  describe('decodeMaze()', () => {
    describe('Scenario: one packed byte of open cells', () => {
      const maze = decodeMaze(Uint8Array.from([0x00, 0x02, 0xff]));

      it('derives height 1', () => {
        expect(maze.height).toBe(1);
      });

      it('reads both cells as 0xF', () => {
        expect(Array.from(maze.cells())).toEqual([0xf, 0xf]);
      });
    });

    describe('Scenario: 2x2 perimeter loop', () => {
      it('restores the cell masks', () => {
        // Act
        const maze = decodeMaze(
          Uint8Array.from([0x00, 0x02, 0b01101001, 0b00111100])
        );
        // Assert
        expect(Array.from(maze.cells())).toEqual([0b0110, 0b1001, 0b0011, 0b1100]);
      });
    });

    describe('Scenario: padded odd cell count', () => {
      it('drops the padding nibble', () => {
        // Act
        const maze = decodeMaze(Uint8Array.from([0x00, 0x03, 0x2a, 0x80]));
        // Assert
        expect(maze.getBounds()).toEqual({ width: 3, height: 1 });
      });
    });

    describe('Scenario: malformed input', () => {
      it('rejects a buffer without cell bytes', () => {
        expect(() => decodeMaze(Uint8Array.from([0x00, 0x02]))).toThrow(
          'maze data needs at least 3 bytes, got 2'
        );
      });

      it('rejects an empty buffer', () => {
        expect(() => decodeMaze(new Uint8Array(0))).toThrow(MalformedEncodingError);
      });

      it('rejects a zero width', () => {
        expect(() => decodeMaze(Uint8Array.from([0x00, 0x00, 0x11]))).toThrow(
          'maze width is zero'
        );
      });

      it('rejects a cell count that does not fill whole rows', () => {
        expect(() => decodeMaze(Uint8Array.from([0x00, 0x03, 0x11, 0x11]))).toThrow(
          '4 cells do not fill rows of width 3'
        );
      });
    });
  });

  describe('round trip', () => {
    describe('Scenario: generated maze with a carved last cell', () => {
      it('decodes to an equal maze', () => {
        // Arrange
        const maze = generateMaze(7, 5, { seed: 'codec-round-trip' });
        // Act
        const decoded = Maze.fromBytes(maze.toBytes());
        // Assert
        expect(decoded.equals(maze)).toBe(true);
      });
    });

    describe('Scenario: odd cell count ending in a walled cell', () => {
      it('decodes to an equal maze', () => {
        // Arrange
        const maze = new Maze(3, 1, [0b0010, 0b1000, 0]);
        // Act & Assert
        expect(decodeMaze(encodeMaze(maze)).equals(maze)).toBe(true);
      });
    });

    describe('Scenario: even cell count ending in a walled cell', () => {
      it('drops the last cell of a one-column maze', () => {
        // Arrange
        const maze = new Maze(1, 2, [0b0100, 0]);
        // Act
        const decoded = decodeMaze(encodeMaze(maze));
        // Assert
        expect(decoded.getBounds()).toEqual({ width: 1, height: 1 });
      });

      it('fails for wider mazes', () => {
        // Arrange
        const maze = new Maze(2, 2, [0b0010, 0b1000, 0b0010, 0]);
        // Act & Assert
        expect(() => decodeMaze(encodeMaze(maze))).toThrow(MalformedEncodingError);
      });

      it('warns about the dropped cell when warnings are enabled', () => {
        // Arrange
        config.warnings = true;
        const spy = jest.spyOn(console, 'warn');
        // Act
        decodeMaze(Uint8Array.from([0x00, 0x01, 0x40]));
        // Assert
        expect(spy).toHaveBeenCalledTimes(1);
        spy.mockRestore();
      });
    });
  });

  describe('tryDecodeMaze()', () => {
    it('returns ok with the maze on success', () => {
      // Act
      const result = tryDecodeMaze(Uint8Array.from([0x00, 0x01, 0x10]));
      // Assert
      expect(result.ok && result.maze.get(0, 0)).toBe(0b0001);
    });

    it('returns the error without throwing on failure', () => {
      // Act
      const result = tryDecodeMaze(Uint8Array.from([0x00, 0x00, 0x10]));
      // Assert
      expect(result.ok ? null : result.error.kind).toBe('MalformedEncoding');
    });
  });
});

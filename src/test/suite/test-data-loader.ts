import * as fs from 'fs';
import * as path from 'path';

/**
 * Utility functions for loading rig fixtures in unit tests
 */
export class TestDataLoader {
    private static readonly TEST_DATA_DIR = path.join(__dirname, 'data');

    /**
     * Get the path to the test data directory
     * @returns Absolute path to test data directory
     */
    public static getTestDataPath(): string {
        return this.TEST_DATA_DIR;
    }

    /** Absolute path of a fixture */
    public static getRigPath(filename: string): string {
        return path.join(this.TEST_DATA_DIR, filename);
    }

    /** Load a rig fixture as text */
    public static loadRigText(filename: string): string {
        return fs.readFileSync(this.getRigPath(filename), 'utf8');
    }

    /** Load a rig fixture as raw bytes */
    public static loadRigBytes(filename: string): Uint8Array {
        return fs.readFileSync(this.getRigPath(filename));
    }

    /**
     * Check if a test data file exists
     * @param filename Name of the file to check
     * @returns True if file exists
     */
    public static hasTestFile(filename: string): boolean {
        return fs.existsSync(this.getRigPath(filename));
    }
}

import fs from 'fs';
import path from 'path';

/**
 * Keeps the serialized platform session on disk between runs.
 * The blob is opaque here; only the platform client understands it.
 */
export class SessionStore {
    readonly filePath: string;

    constructor(filePath: string) {
        this.filePath = path.resolve(process.cwd(), filePath);
    }

    exists(): boolean {
        return fs.existsSync(this.filePath);
    }

    load(): string | null {
        if (!this.exists()) {
            return null;
        }

        try {
            return fs.readFileSync(this.filePath, 'utf-8');
        } catch (error) {
            console.error('Error reading session file:', error);
            return null;
        }
    }

    save(blob: string): void {
        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        fs.writeFileSync(this.filePath, blob);
    }
}

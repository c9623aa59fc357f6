import * as fs from 'fs-extra';
import * as path from 'path';
import type { SessionSnapshot } from '../types';

/**
 * Session exports as pretty-printed JSON files under `<dataDir>/exports`
 */
export class StorageService {
    private exportsDir: string;

    constructor(private dataDir: string) {
        this.exportsDir = path.join(this.dataDir, 'exports');
    }

    private fileFor(sessionId: string): string {
        if (!/^[\w-]+$/.test(sessionId)) {
            throw new RangeError(`Invalid session id: ${sessionId}`);
        }
        return path.join(this.exportsDir, `${sessionId}.json`);
    }

    /**
     * Write a snapshot, replacing any earlier export of the same session
     */
    async saveSnapshot(snapshot: SessionSnapshot): Promise<string> {
        await fs.ensureDir(this.exportsDir);
        const file = this.fileFor(snapshot.sessionId);
        await fs.writeJson(file, snapshot, { spaces: 2 });
        console.log(`💾 Conversation data saved to ${file}`);
        return file;
    }

    async loadSnapshot(sessionId: string): Promise<SessionSnapshot | null> {
        const file = this.fileFor(sessionId);
        if (await fs.pathExists(file)) {
            return await fs.readJson(file);
        }
        return null;
    }

    /**
     * All saved exports, newest session first
     */
    async listSnapshots(): Promise<SessionSnapshot[]> {
        if (!(await fs.pathExists(this.exportsDir))) {
            return [];
        }

        const files = await fs.readdir(this.exportsDir);
        const snapshots: SessionSnapshot[] = [];
        for (const file of files) {
            if (file.endsWith('.json')) {
                snapshots.push(await fs.readJson(path.join(this.exportsDir, file)));
            }
        }

        return snapshots.sort((a, b) => new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime());
    }

    async deleteSnapshot(sessionId: string): Promise<boolean> {
        const file = this.fileFor(sessionId);
        if (!(await fs.pathExists(file))) {
            return false;
        }
        await fs.remove(file);
        return true;
    }
}

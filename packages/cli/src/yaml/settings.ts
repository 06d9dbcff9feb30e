import { Document, isMap, parseDocument } from 'yaml';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { SettingsSchema, type Settings } from '@pocket-ledger/shared';

const HEADER = ' Pocket Ledger workspace settings\n Every field is optional; removed fields fall back to the defaults below.';

export interface SettingsWriteResult {
    created: boolean;
    /** Dotted paths of fields that were filled in. */
    added: string[];
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Writes a settings file with every default filled in.
 *
 * An existing file is round-tripped: comments and values the user set are
 * preserved and only absent fields are added.
 */
export async function writeDefaultSettings(
    filePath: string,
    defaults: Settings = SettingsSchema.parse({})
): Promise<SettingsWriteResult> {
    let content: string | null = null;
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (!isMissingFile(err)) throw err;
    }

    const existing = content === null ? null : parseDocument(content);
    if (existing && existing.errors.length > 0) {
        throw new Error(`Invalid YAML in ${filePath}: ${existing.errors[0].message}`);
    }

    let doc: Document;
    const added: string[] = [];

    if (existing && isMap(existing.contents)) {
        doc = existing;
        for (const [section, value] of Object.entries(defaults)) {
            if (typeof value === 'object' && value !== null) {
                for (const [key, inner] of Object.entries(value)) {
                    if (!doc.hasIn([section, key])) {
                        doc.setIn([section, key], inner);
                        added.push(`${section}.${key}`);
                    }
                }
            } else if (!doc.has(section)) {
                doc.set(section, value);
                added.push(section);
            }
        }
    } else if (existing && existing.contents !== null) {
        throw new Error(`Invalid YAML structure in ${filePath}: settings must be a mapping.`);
    } else {
        // Missing, empty or comment-only file
        doc = new Document(defaults);
        doc.commentBefore = existing?.commentBefore ?? existing?.comment ?? HEADER;
        added.push(...Object.keys(defaults));
    }

    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, doc.toString());
    return { created: content === null, added };
}

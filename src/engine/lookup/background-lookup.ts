import { ABILITY_LABELS, AbilitySchema } from '../../schema/ability.js';
import type { Background } from '../../schema/background.js';
import { failure, success, type ToolResult } from '../../utils/tool-result.js';
import type { ReferenceData } from '../reference/reference-data.js';
import { checkEnumFilter } from './enum-filter.js';

export interface BackgroundFilters {
    ability?: string;
    skill?: string;
}

export class BackgroundLookup {
    constructor(private readonly data: ReferenceData) {}

    findByName(name: string): ToolResult<Background> {
        const background = this.data.backgrounds.resolve(name);
        return background ? success(background) : failure(`No background matches ${name}`);
    }

    /** Ability is validated; skill matches case-insensitively. */
    list(filters: BackgroundFilters = {}): ToolResult<Background[]> {
        const ability = checkEnumFilter(AbilitySchema, 'ability', filters.ability);
        if (!ability.ok) return ability.failure;

        const abilityLabel = ability.value === undefined ? undefined : ABILITY_LABELS[ability.value];
        const skill = filters.skill?.trim().toLowerCase();

        return success(this.data.backgrounds.records.filter(background =>
            (abilityLabel === undefined || background.abilityScores.includes(abilityLabel)) &&
            (skill === undefined ||
                background.skillProficiencies.some(proficiency => proficiency.toLowerCase() === skill))
        ));
    }

    /** Case-insensitive substring match on the origin feat. */
    listByFeat(feat: string): ToolResult<Background[]> {
        const needle = feat.trim().toLowerCase();
        const matches = this.data.backgrounds.records.filter(background =>
            background.originFeat.toLowerCase().includes(needle)
        );
        return matches.length > 0
            ? success(matches)
            : failure(`No backgrounds found with feat matching '${feat}'`);
    }

    listAllSkills(): ToolResult<string[]> {
        const skills = new Set(this.data.backgrounds.records.flatMap(background => background.skillProficiencies));
        return success([...skills].sort());
    }

    listAllFeats(): ToolResult<string[]> {
        const feats = new Set(this.data.backgrounds.records.map(background => background.originFeat));
        return success([...feats].sort());
    }
}

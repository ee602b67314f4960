import { RaceAbilitySchema, SizeSchema, type Race, type RaceAbilityBonus } from '../../schema/race.js';
import { failure, success, type ToolResult } from '../../utils/tool-result.js';
import type { ReferenceData } from '../reference/reference-data.js';
import { checkEnumFilter } from './enum-filter.js';

export interface RaceFilters {
    size?: string;
    hasDarkvision?: boolean;
    ability?: string;
}

export interface RaceAbilityBonuses {
    race: string;
    abilityScores: RaceAbilityBonus[];
}

export class RaceLookup {
    constructor(private readonly data: ReferenceData) {}

    findByName(name: string): ToolResult<Race> {
        const race = this.data.races.resolve(name);
        return race ? success(race) : failure(`No race matches ${name}`);
    }

    list(filters: RaceFilters = {}): ToolResult<Race[]> {
        const size = checkEnumFilter(SizeSchema, 'size', filters.size);
        if (!size.ok) return size.failure;
        const ability = checkEnumFilter(RaceAbilitySchema, 'ability', filters.ability);
        if (!ability.ok) return ability.failure;

        return success(this.data.races.records.filter(race =>
            (size.value === undefined || race.size === size.value) &&
            (filters.hasDarkvision === undefined || (race.darkvision !== null) === filters.hasDarkvision) &&
            (ability.value === undefined || race.abilityScores.some(bonus => bonus.ability === ability.value))
        ));
    }

    getAbilityBonuses(name: string): ToolResult<RaceAbilityBonuses> {
        const race = this.findByName(name);
        if (race.status === 'failure') return race;
        return success({ race: race.result.name, abilityScores: race.result.abilityScores });
    }

    listByAbility(ability: string): ToolResult<Race[]> {
        return this.list({ ability });
    }

    listSizes(): ToolResult<string[]> {
        return success([...SizeSchema.options]);
    }
}

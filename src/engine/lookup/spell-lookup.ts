import { SpellClassSchema, SpellSchoolSchema, CANTRIP_LEVEL, type Spell } from '../../schema/spell.js';
import { failure, success, type ToolResult } from '../../utils/tool-result.js';
import { SPELLBOOK_SPELL_LEVEL } from '../character/wizard-rules.js';
import type { ReferenceData } from '../reference/reference-data.js';
import { checkEnumFilter } from './enum-filter.js';

export interface SpellFilters {
    class?: string;
    school?: string;
    level?: number;
    maxLevel?: number;
    isRitual?: boolean;
    isConcentration?: boolean;
}

export interface SpellComparison {
    spellA: Spell;
    spellB: Spell;
}

export class SpellLookup {
    constructor(private readonly data: ReferenceData) {}

    findByName(name: string): ToolResult<Spell> {
        const spell = this.data.spells.resolve(name);
        return spell ? success(spell) : failure(`No spell matches ${name}`);
    }

    /** All filters are AND-ed; school and class are checked before scanning. */
    list(filters: SpellFilters = {}): ToolResult<Spell[]> {
        const spellClass = checkEnumFilter(SpellClassSchema, 'class', filters.class);
        if (!spellClass.ok) return spellClass.failure;
        const school = checkEnumFilter(SpellSchoolSchema, 'school', filters.school);
        if (!school.ok) return school.failure;

        const matches = this.data.spells.records.filter(spell =>
            (spellClass.value === undefined || spell.classes.includes(spellClass.value)) &&
            (school.value === undefined || spell.school === school.value) &&
            (filters.level === undefined || spell.level === filters.level) &&
            (filters.maxLevel === undefined || spell.level <= filters.maxLevel) &&
            (filters.isRitual === undefined || spell.ritual === filters.isRitual) &&
            (filters.isConcentration === undefined || spell.concentration === filters.isConcentration)
        );
        return success(matches);
    }

    /** Schools that appear in the data, in first-seen order. */
    listSchools(): ToolResult<string[]> {
        return success([...new Set(this.data.spells.records.map(spell => spell.school))]);
    }

    listClasses(): ToolResult<string[]> {
        return success([...new Set(this.data.spells.records.flatMap(spell => spell.classes))]);
    }

    /** Fails with the first unresolved name, unchanged. */
    compare(nameA: string, nameB: string): ToolResult<SpellComparison> {
        const spellA = this.findByName(nameA);
        if (spellA.status === 'failure') return spellA;
        const spellB = this.findByName(nameB);
        if (spellB.status === 'failure') return spellB;
        return success({ spellA: spellA.result, spellB: spellB.result });
    }

    /** Names of the spells a new wizard may learn as cantrips. */
    listWizardCantrips(): ToolResult<string[]> {
        return this.wizardSpellNames(CANTRIP_LEVEL);
    }

    /** Names of the spells a new wizard may copy into the spellbook. */
    listWizardLevel1Spells(): ToolResult<string[]> {
        return this.wizardSpellNames(SPELLBOOK_SPELL_LEVEL);
    }

    private wizardSpellNames(level: number): ToolResult<string[]> {
        const spells = this.list({ class: 'wizard', level });
        if (spells.status === 'failure') return spells;
        return success(spells.result.map(spell => spell.name));
    }
}

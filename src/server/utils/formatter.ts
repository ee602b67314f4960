/**
 * RichFormatter - markdown rendering for tool output.
 * The JSON envelope is embedded alongside for programmatic callers.
 */

import { ABILITIES, ABILITY_LABELS, type AbilityScores } from '../../schema/ability.js';
import type { Background } from '../../schema/background.js';
import type { CharacterSheet } from '../../schema/character-sheet.js';
import type { Race } from '../../schema/race.js';
import type { Spell } from '../../schema/spell.js';
import { abilityModifier, totalAbilityScores } from '../../engine/character/abilities.js';

type AlertType = 'success' | 'error' | 'warning' | 'info';

const ALERT_ICONS: Record<AlertType, string> = { success: '✅', error: '❌', warning: '⚠️', info: 'ℹ️' };

export class RichFormatter {
    // ============================================================
    // HEADERS & SECTIONS
    // ============================================================

    static header(title: string, icon: string = '🧙'): string {
        const line = '━'.repeat(40);
        return `\n${line}\n${icon}  **${title.toUpperCase()}**\n${line}\n`;
    }

    static section(title: string): string {
        return `\n### ${title}\n`;
    }

    // ============================================================
    // DATA FORMATTING
    // ============================================================

    /** Skips null and undefined values. */
    static keyValue(data: Record<string, unknown>): string {
        let output = '';
        for (const [key, value] of Object.entries(data)) {
            if (value === undefined || value === null) continue;
            const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
            output += `- **${key}:** ${displayValue}\n`;
        }
        return output;
    }

    static table(headers: string[], rows: (string | number)[][]): string {
        if (rows.length === 0) {
            return '\n*No data*\n';
        }
        const headerRow = `| ${headers.join(' | ')} |`;
        const separatorRow = `| ${headers.map(() => '---').join(' | ')} |`;
        const dataRows = rows.map(row => `| ${row.join(' | ')} |`).join('\n');
        return `\n${headerRow}\n${separatorRow}\n${dataRows}\n`;
    }

    static list(items: readonly string[], ordered: boolean = false): string {
        if (items.length === 0) return '\n*None*\n';
        return '\n' + items.map((item, i) => ordered ? `${i + 1}. ${item}` : `- ${item}`).join('\n') + '\n';
    }

    static signed(value: number): string {
        return value >= 0 ? `+${value}` : String(value);
    }

    // ============================================================
    // ALERTS & STATUS
    // ============================================================

    static alert(message: string, type: AlertType = 'info'): string {
        return `\n> ${ALERT_ICONS[type]} **${type.toUpperCase()}**: ${message}\n`;
    }

    static success(message: string): string {
        return this.alert(message, 'success');
    }

    static error(message: string): string {
        return this.alert(message, 'error');
    }

    // ============================================================
    // CHARACTER SHEET
    // ============================================================

    static abilityTable(scores: AbilityScores): string {
        return this.table(
            ['Ability', 'Score', 'Mod'],
            ABILITIES.map(ability => [
                ABILITY_LABELS[ability],
                scores[ability],
                this.signed(abilityModifier(scores[ability]))
            ])
        );
    }

    static characterSheet(sheet: CharacterSheet): string {
        let output = this.header(sheet.name ?? 'Unnamed Wizard', '🧙');
        output += this.keyValue({
            'Race': sheet.race ?? 'Not chosen',
            'Class': sheet.characterClass ? `${sheet.characterClass} ${sheet.level}` : 'Not chosen',
            'Background': sheet.background ?? 'Not chosen',
            'Size': sheet.size,
            'Speed': `${sheet.speed} ft`,
            'Darkvision': sheet.darkvision === null ? null : `${sheet.darkvision} ft`,
            'HP': sheet.maxHp,
            'AC': sheet.armorClass,
            'Initiative': sheet.initiative === null ? null : this.signed(sheet.initiative),
            'Passive Perception': sheet.passivePerception
        });

        output += this.section('Ability Scores (with background bonuses)');
        output += this.abilityTable(totalAbilityScores(sheet));

        output += this.section('Proficiencies');
        output += this.keyValue({
            'Saving Throws': sheet.savingThrowProficiencies.join(', ') || '-',
            'Skills': sheet.skillProficiencies.join(', ') || '-',
            'Weapons': sheet.weaponProficiencies.join(', ') || '-',
            'Tools': sheet.toolProficiencies.join(', ') || '-',
            'Languages': sheet.languages.join(', ') || '-'
        });

        if (sheet.spellcastingAbility) {
            output += this.section('Spellcasting');
            output += this.keyValue({
                'Ability': sheet.spellcastingAbility,
                'Save DC': sheet.spellSaveDc,
                'Attack': sheet.spellAttackBonus === null ? null : this.signed(sheet.spellAttackBonus),
                'Max Prepared': sheet.maxPreparedSpells
            });
        }

        output += this.section(`Cantrips (${sheet.cantripsKnown.length}/3)`);
        output += this.list(sheet.cantripsKnown);
        output += this.section(`Spellbook (${sheet.spellbook.length}/6)`);
        output += this.list(sheet.spellbook.map(name =>
            sheet.preparedSpells.includes(name) ? `${name} *(prepared)*` : name
        ));
        return output;
    }

    // ============================================================
    // REFERENCE RECORDS
    // ============================================================

    static spell(spell: Spell): string {
        const level = spell.level === 0 ? 'Cantrip' : `Level ${spell.level}`;
        let output = this.header(spell.name, '✨');
        output += this.keyValue({
            'Level': level,
            'School': spell.school,
            'Casting': spell.actionType,
            'Range': spell.range,
            'Components': spell.material
                ? `${spell.components.join(', ')} (${spell.material})`
                : spell.components.join(', '),
            'Duration': spell.duration,
            'Concentration': spell.concentration ? 'yes' : 'no',
            'Ritual': spell.ritual ? 'yes' : 'no',
            'Classes': spell.classes.join(', ')
        });
        output += `\n${spell.description}\n`;
        if (spell.cantripUpgrade) {
            output += `\n*Higher levels:* ${spell.cantripUpgrade}\n`;
        }
        return output;
    }

    static spellTable(spells: readonly Spell[]): string {
        return this.table(
            ['Name', 'Lvl', 'School', 'Conc', 'Ritual'],
            spells.map(spell => [
                spell.name,
                spell.level,
                spell.school,
                spell.concentration ? 'yes' : '-',
                spell.ritual ? 'yes' : '-'
            ])
        );
    }

    static raceBonuses(race: Pick<Race, 'abilityScores'>): string {
        return race.abilityScores
            .map(bonus => bonus.ability === 'any'
                ? `${this.signed(bonus.bonus)} to ${bonus.count ?? 1} abilities of your choice`
                : `${ABILITY_LABELS[bonus.ability]} ${this.signed(bonus.bonus)}`)
            .join(', ');
    }

    static race(race: Race): string {
        let output = this.header(race.name, '🧝');
        output += this.keyValue({
            'Size': race.size,
            'Speed': `${race.speed} ft`,
            'Darkvision': race.darkvision === null ? 'none' : `${race.darkvision} ft`,
            'Ability Bonuses': this.raceBonuses(race) || '-',
            'Source': race.source
        });
        output += this.section('Traits');
        output += this.list(race.traits);
        return output;
    }

    static raceTable(races: readonly Race[]): string {
        return this.table(
            ['Name', 'Size', 'Darkvision', 'Bonuses'],
            races.map(race => [
                race.name,
                race.size,
                race.darkvision === null ? '-' : `${race.darkvision} ft`,
                this.raceBonuses(race) || '-'
            ])
        );
    }

    static background(background: Background): string {
        let output = this.header(background.name, '📜');
        output += this.keyValue({
            'Ability Scores': background.abilityScores.join(', '),
            'Origin Feat': background.originFeat,
            'Skills': background.skillProficiencies.join(', '),
            'Tool': background.toolProficiency
        });
        output += this.section('Equipment');
        output += this.list(background.equipment);
        return output;
    }

    static backgroundTable(backgrounds: readonly Background[]): string {
        return this.table(
            ['Name', 'Abilities', 'Feat', 'Skills'],
            backgrounds.map(background => [
                background.name,
                background.abilityScores.join(', '),
                background.originFeat,
                background.skillProficiencies.join(', ')
            ])
        );
    }

    // ============================================================
    // JSON EMBEDDING (for programmatic callers)
    // ============================================================

    static embedJson(data: unknown, tag: string = 'DATA'): string {
        return `\n<!-- ${tag}_JSON\n${JSON.stringify(data)}\n${tag}_JSON -->\n`;
    }
}

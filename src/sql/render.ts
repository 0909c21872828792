import type { LootEntry, Target, TargetKind } from '../shared/types.js';
import type { LootRules } from '../engine/rules.js';
import { capitalize } from '../shared/utils.js';

interface LootTable {
  label: string;
  variable: string;
  table: string;
  /** `SourceTypeOrReferenceId` of the matching conditions rows. */
  conditionSource: number;
}

export const LOOT_TABLES: Record<TargetKind, LootTable> = {
  npc: { label: 'NPC', variable: '@NPC', table: 'creature_loot_template', conditionSource: 1 },
  object: { label: 'GameObject', variable: '@OBJECT', table: 'gameobject_loot_template', conditionSource: 4 },
  item: { label: 'Item', variable: '@ITEM', table: 'item_loot_template', conditionSource: 5 },
};

const LOOT_COLUMNS =
  '(`entry`,`item`,`ChanceOrQuestChance`,`lootmode`,`groupid`,`mincountOrRef`,`maxcount`,`shared`)';

const CONDITION_COLUMNS =
  '(`SourceTypeOrReferenceId`, `SourceGroup`, `SourceEntry`, `SourceId`, `ElseGroup`, ' +
  '`ConditionTypeOrReference`, `ConditionTarget`, `ConditionValue1`, `ConditionValue2`, ' +
  '`ConditionValue3`, `NegativeCondition`, `ErrorTextId`, `ScriptName`, `Comment`)';

const CONDITION_SKILL = 7;
const CONDITION_ITEM = 2;

export function formatChance(chance: number): string {
  return chance.toFixed(2);
}

function commentSafe(text: string): string {
  return text.replace(/\*\//g, '* /').replace(/[\r\n]+/g, ' ');
}

function commentLine(entry: LootEntry): string {
  const parts = [`chance:${formatChance(entry.dropChance)}%`];
  if (entry.isQuestItem) parts.push('quest');
  parts.push(`quality:${entry.quality}`);
  if (entry.isRecipe) {
    const profs = entry.professions.length > 0 ? entry.professions.join('/') : 'unknown';
    parts.push(`${profs} (recipe)`);
  }
  if (entry.isLegendary) parts.push('legendary');
  parts.push(`name:${commentSafe(entry.name ?? '')}`);
  return `${entry.itemId} -- ${parts.join(' -- ')}`;
}

function lootRow(entry: LootEntry, variable: string, rules: LootRules): string {
  const { lootmode, groupid, mincount, maxcount, shared } = rules.row;
  const min = entry.minCount ?? mincount;
  const max = entry.maxCount ?? maxcount;
  return `(${variable},${entry.itemId},${formatChance(entry.dropChance)},${lootmode},${groupid},${min},${max},${shared})`;
}

/**
 * DELETE plus two INSERTs gating a recipe drop on the profession skill and
 * on the recipe not being carried already. Several professions become
 * alternative else-groups.
 */
function conditionBlock(entry: LootEntry, table: LootTable, rules: LootRules): string[] {
  const source = table.conditionSource;
  const v = table.variable;
  const id = entry.itemId;

  const hasSkill = entry.professions.map(
    (prof, i) =>
      `(${source}, ${v}, ${id}, 0, ${i + 1}, ${CONDITION_SKILL}, 0, ${rules.professionSkillIds[prof]}, 1, 0, 0, 0, '', ` +
      `'Item Drop - Has ${capitalize(prof)}')`,
  );
  const noItem = entry.professions.map(
    (_prof, i) =>
      `(${source}, ${v}, ${id}, 0, ${i + 1}, ${CONDITION_ITEM}, 0, ${id}, 1, 1, 1, 0, '', 'Item Drop - No Item')`,
  );

  return [
    `DELETE FROM conditions WHERE \`SourceTypeOrReferenceId\`=${source} AND \`SourceGroup\`=${v} AND \`SourceEntry\`=${id};`,
    `INSERT INTO conditions ${CONDITION_COLUMNS} VALUES`,
    `${hasSkill.join(',\n')};`,
    `INSERT INTO conditions ${CONDITION_COLUMNS} VALUES`,
    `${noItem.join(',\n')};`,
  ];
}

/**
 * Render the SQL block for one target. Output depends only on the inputs
 * and always ends with a single newline.
 */
export function renderLootSql(
  target: Target,
  entries: readonly LootEntry[],
  rules: LootRules,
  targetName?: string,
): string {
  const table = LOOT_TABLES[target.kind];
  const title = targetName ? ` - ${commentSafe(targetName)}` : '';
  const lines = [`/* ${table.label} ${target.id}${title} loot list`];

  if (entries.length === 0) {
    lines.push('no loot', '*/');
    return `${lines.join('\n')}\n`;
  }

  for (const entry of entries) lines.push(commentLine(entry));
  lines.push('*/', '');

  lines.push(`SET ${table.variable} := ${target.id};`);
  lines.push(`REPLACE INTO ${table.table} ${LOOT_COLUMNS} VALUES`);
  lines.push(`${entries.map((e) => lootRow(e, table.variable, rules)).join(',\n')};`);

  const gated = entries.filter((e) => e.professions.length > 0);
  if (gated.length > 0) {
    lines.push('', '-- loot conditions');
    for (const entry of gated) lines.push(...conditionBlock(entry, table, rules));
  }

  return `${lines.join('\n')}\n`;
}

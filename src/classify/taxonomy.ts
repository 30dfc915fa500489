export const DISCIPLINES = [
  'Computer Science',
  'Biology',
  'Chemistry & Materials Science',
  'Physics',
  'Mathematics',
  'Medicine',
  'Psychology',
  'Economics',
  'Linguistics',
  'History',
  'Sociology & Political Science',
  'Arts & Humanities',
  'Education',
  'Other',
  'General call',
] as const;

export type Discipline = (typeof DISCIPLINES)[number];

export const POSITION_TYPES = ['PhD Student', 'Postdoc', 'Master Student', 'Research Assistant'] as const;

export type PositionType = (typeof POSITION_TYPES)[number];

export const MAX_DISCIPLINES = 3;
export const MAX_POSITION_TYPES = POSITION_TYPES.length;

/** Job-board search fields mapped onto the discipline taxonomy. */
export const DISCIPLINE_MAPPING: Readonly<Record<string, Discipline>> = {
  'Computer Science': 'Computer Science',
  'Medical Sciences': 'Medicine',
  Biology: 'Biology',
  Chemistry: 'Chemistry & Materials Science',
  'Materials Science': 'Chemistry & Materials Science',
  Physics: 'Physics',
  Mathematics: 'Mathematics',
  Economics: 'Economics',
  Engineering: 'Other',
  Science: 'General call',
  Psychology: 'Psychology',
  Linguistics: 'Linguistics',
  History: 'History',
  Education: 'Education',
  Arts: 'Arts & Humanities',
};

/**
 * Case-insensitive exact match first, then the first taxonomy entry the
 * value contains ("PhD Student position" -> "PhD Student").
 */
export function matchDiscipline(value: string): Discipline | null {
  const lower = value.trim().toLowerCase();
  if (!lower) return null;
  const exact = DISCIPLINES.find((d) => d.toLowerCase() === lower);
  if (exact) return exact;
  return DISCIPLINES.find((d) => lower.includes(d.toLowerCase())) ?? null;
}

export function matchPositionType(value: string): PositionType | null {
  const lower = value.trim().toLowerCase();
  if (!lower) return null;
  const exact = POSITION_TYPES.find((p) => p.toLowerCase() === lower);
  if (exact) return exact;
  return POSITION_TYPES.find((p) => lower.includes(p.toLowerCase())) ?? null;
}

export function mapFieldToDiscipline(field: string): Discipline {
  return DISCIPLINE_MAPPING[field] ?? 'Other';
}

export type EventScope = 'generic' | 'family' | 'individual' | 'fact' | 'custom';

export interface EventTypeInfo {
  /** Tag the event is written with. */
  tag: string;
  scope: EventScope;
  description: string;
}

export const EVENT_TYPES = {
  EVEN: { tag: 'EVEN', scope: 'generic', description: 'Other Event' },
  ANUL: { tag: 'ANUL', scope: 'family', description: 'Annulment' },
  CENS_FAM: { tag: 'CENS', scope: 'family', description: 'Census' },
  DIV: { tag: 'DIV', scope: 'family', description: 'Divorce' },
  DIVF: { tag: 'DIVF', scope: 'family', description: 'Divorce Filed' },
  ENGA: { tag: 'ENGA', scope: 'family', description: 'Engagement' },
  MARB: { tag: 'MARB', scope: 'family', description: 'Marriage Banns' },
  MARC: { tag: 'MARC', scope: 'family', description: 'Marriage Contract' },
  MARR: { tag: 'MARR', scope: 'family', description: 'Marriage' },
  MARL: { tag: 'MARL', scope: 'family', description: 'Marriage License' },
  MARS: { tag: 'MARS', scope: 'family', description: 'Marriage Settlement' },
  RESI_FAM: { tag: 'RESI', scope: 'family', description: 'Residence' },
  BIRT: { tag: 'BIRT', scope: 'individual', description: 'Birth' },
  CHR: { tag: 'CHR', scope: 'individual', description: 'Christening' },
  DEAT: { tag: 'DEAT', scope: 'individual', description: 'Death' },
  BURI: { tag: 'BURI', scope: 'individual', description: 'Burial' },
  CREM: { tag: 'CREM', scope: 'individual', description: 'Cremation' },
  ADOP: { tag: 'ADOP', scope: 'individual', description: 'Adoption' },
  BAPM: { tag: 'BAPM', scope: 'individual', description: 'Baptism' },
  BARM: { tag: 'BARM', scope: 'individual', description: 'Bar Mitzvah' },
  BASM: { tag: 'BASM', scope: 'individual', description: 'Bas Mitzvah' },
  BLES: { tag: 'BLES', scope: 'individual', description: 'Blessing' },
  CHRA: { tag: 'CHRA', scope: 'individual', description: 'Adult Christening' },
  CONF: { tag: 'CONF', scope: 'individual', description: 'Confirmation' },
  FCOM: { tag: 'FCOM', scope: 'individual', description: 'First Communion' },
  ORDN: { tag: 'ORDN', scope: 'individual', description: 'Ordination' },
  NATU: { tag: 'NATU', scope: 'individual', description: 'Naturalization' },
  EMIG: { tag: 'EMIG', scope: 'individual', description: 'Emigration' },
  IMMI: { tag: 'IMMI', scope: 'individual', description: 'Immigration' },
  CENS: { tag: 'CENS', scope: 'individual', description: 'Census' },
  PROB: { tag: 'PROB', scope: 'individual', description: 'Probate' },
  WILL: { tag: 'WILL', scope: 'individual', description: 'Will' },
  GRAD: { tag: 'GRAD', scope: 'individual', description: 'Graduation' },
  RETI: { tag: 'RETI', scope: 'individual', description: 'Retirement' },
  FACT: { tag: 'FACT', scope: 'fact', description: 'Other Fact' },
  CAST: { tag: 'CAST', scope: 'fact', description: 'Caste' },
  DSCR: { tag: 'DSCR', scope: 'fact', description: 'Physical Description' },
  EDUC: { tag: 'EDUC', scope: 'fact', description: 'Education' },
  IDNO: { tag: 'IDNO', scope: 'fact', description: 'National ID Number' },
  NATI: { tag: 'NATI', scope: 'fact', description: 'Nationality' },
  NCHI: { tag: 'NCHI', scope: 'fact', description: 'Number of Children' },
  NMR: { tag: 'NMR', scope: 'fact', description: 'Number of Marriages' },
  OCCU: { tag: 'OCCU', scope: 'fact', description: 'Occupation' },
  PROP: { tag: 'PROP', scope: 'fact', description: 'Property' },
  RELI: { tag: 'RELI', scope: 'fact', description: 'Religion' },
  RESI: { tag: 'RESI', scope: 'fact', description: 'Residence' },
  SSN: { tag: 'SSN', scope: 'fact', description: 'Social Security Number' },
  TITL: { tag: 'TITL', scope: 'fact', description: 'Title' },
  CUSTOM: { tag: '_UNKN', scope: 'custom', description: 'Custom' },
} as const satisfies Record<string, EventTypeInfo>;

export type EventType = keyof typeof EVENT_TYPES;

const EVENT_TYPE_KEYS = Object.keys(EVENT_TYPES).filter(isEventType);

export function isEventType(value: string): value is EventType {
  return Object.prototype.hasOwnProperty.call(EVENT_TYPES, value);
}

/** First event type of one of `scopes` written with `tag`. */
export function eventTypeForTag(tag: string, scopes: readonly EventScope[]): EventType | undefined {
  return EVENT_TYPE_KEYS.find(key => {
    const info: EventTypeInfo = EVENT_TYPES[key];
    return info.tag === tag && scopes.includes(info.scope);
  });
}

/** Maps a human readable description, e.g. the value of a `TYPE` line, back to its type. */
export function readableToEventType(description: string, scopes: readonly EventScope[]): EventType | undefined {
  const wanted = description.trim().toLowerCase();
  if (!wanted) {
    return undefined;
  }
  return EVENT_TYPE_KEYS.find(key => {
    const info: EventTypeInfo = EVENT_TYPES[key];
    return info.description.toLowerCase() === wanted && scopes.includes(info.scope);
  });
}

import {
  boolean,
  defineSchema,
  field,
  idShift,
  int,
  list,
  optionalIdShift,
  optionalText,
  text,
} from '../schema/index.js';
import {
  eventCommandSchema,
  moveRouteSchema,
  type EventCommand,
  type MoveRoute,
} from './commands.js';

export interface EventCondition {
  switch1Valid: boolean;
  switch2Valid: boolean;
  variableValid: boolean;
  selfSwitchValid: boolean;
  switch1Id: number;
  switch2Id: number;
  variableId: number;
  variableValue: number;
  selfSwitchCh: string;
}

export interface Graphic {
  /** `null` when the page shows a character sprite instead of a tile. */
  tileId: number | null;
  characterName: string | null;
  characterHue: number;
  direction: number;
  pattern: number;
  opacity: number;
  blendType: number;
}

export interface EventPage {
  condition: EventCondition;
  graphic: Graphic;
  moveType: number;
  moveSpeed: number;
  moveFrequency: number;
  moveRoute: MoveRoute;
  walkAnime: boolean;
  stepAnime: boolean;
  directionFix: boolean;
  through: boolean;
  alwaysOnTop: boolean;
  trigger: number;
  list: EventCommand[];
}

export interface Event {
  id: number;
  name: string;
  x: number;
  y: number;
  pages: EventPage[];
}

export interface CommonEvent {
  id: number;
  name: string;
  trigger: number;
  switchId: number;
  list: EventCommand[];
}

export const eventConditionSchema = defineSchema<EventCondition>('RPG::Event::Page::Condition', {
  switch1Valid: field(boolean),
  switch2Valid: field(boolean),
  variableValid: field(boolean),
  selfSwitchValid: field(boolean),
  switch1Id: field(idShift),
  switch2Id: field(idShift),
  variableId: field(int),
  variableValue: field(int),
  selfSwitchCh: field(text),
});

export const graphicSchema = defineSchema<Graphic>('RPG::Event::Page::Graphic', {
  tileId: field(optionalIdShift),
  characterName: field(optionalText),
  characterHue: field(int),
  direction: field(int),
  pattern: field(int),
  opacity: field(int),
  blendType: field(int),
});

export const eventPageSchema = defineSchema<EventPage>('RPG::Event::Page', {
  condition: field(eventConditionSchema),
  graphic: field(graphicSchema),
  moveType: field(int),
  moveSpeed: field(int),
  moveFrequency: field(int),
  moveRoute: field(moveRouteSchema),
  walkAnime: field(boolean),
  stepAnime: field(boolean),
  directionFix: field(boolean),
  through: field(boolean),
  alwaysOnTop: field(boolean),
  trigger: field(int),
  list: field(list(eventCommandSchema)),
});

export const eventSchema = defineSchema<Event>('RPG::Event', {
  id: field(int),
  name: field(text),
  x: field(int),
  y: field(int),
  pages: field(list(eventPageSchema)),
});

export const commonEventSchema = defineSchema<CommonEvent>('RPG::CommonEvent', {
  id: field(idShift),
  name: field(text),
  trigger: field(int),
  switchId: field(int),
  list: field(list(eventCommandSchema)),
});

/** A fresh page as the editor creates it. */
export function defaultEventPage(): EventPage {
  return {
    condition: {
      switch1Valid: false,
      switch2Valid: false,
      variableValid: false,
      selfSwitchValid: false,
      switch1Id: 0,
      switch2Id: 0,
      variableId: 0,
      variableValue: 0,
      selfSwitchCh: 'A',
    },
    graphic: {
      tileId: null,
      characterName: null,
      characterHue: 0,
      direction: 2,
      pattern: 0,
      opacity: 255,
      blendType: 0,
    },
    moveType: 0,
    moveSpeed: 3,
    moveFrequency: 3,
    moveRoute: { repeat: true, skippable: false, list: [{ code: 0, parameters: [] }] },
    walkAnime: true,
    stepAnime: false,
    directionFix: false,
    through: false,
    alwaysOnTop: false,
    trigger: 0,
    list: [{ code: 0, indent: 0, parameters: [] }],
  };
}

export function newEvent(id: number, x: number, y: number): Event {
  return { id, name: `EV${String(id).padStart(3, '0')}`, x, y, pages: [defaultEventPage()] };
}

export function defaultCommonEvent(id = 0): CommonEvent {
  return { id, name: '', trigger: 0, switchId: 1, list: [{ code: 0, indent: 0, parameters: [] }] };
}

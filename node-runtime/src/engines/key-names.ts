// Key names as step authors and the recorder write them, mapped to X keysyms.
const KEYSYMS: Record<string, string> = {
  enter: 'Return',
  return: 'Return',
  esc: 'Escape',
  escape: 'Escape',
  tab: 'Tab',
  space: 'space',
  backspace: 'BackSpace',
  delete: 'Delete',
  del: 'Delete',
  insert: 'Insert',
  home: 'Home',
  end: 'End',
  pageup: 'Prior',
  pgup: 'Prior',
  page_up: 'Prior',
  pagedown: 'Next',
  pgdn: 'Next',
  page_down: 'Next',
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right',
  capslock: 'Caps_Lock',
  caps_lock: 'Caps_Lock',
  ctrl: 'ctrl',
  ctrl_l: 'Control_L',
  ctrl_r: 'Control_R',
  shift: 'shift',
  shift_r: 'Shift_R',
  alt: 'alt',
  alt_l: 'Alt_L',
  alt_r: 'Alt_R',
  alt_gr: 'ISO_Level3_Shift',
  command: 'super',
  cmd: 'super',
  cmd_r: 'Super_R',
  win: 'super',
};

export function toKeysym(name: string): string {
  const key = name.toLowerCase();
  if (Object.hasOwn(KEYSYMS, key)) return KEYSYMS[key];
  const fn = /^f(\d{1,2})$/i.exec(name);
  if (fn) return `F${fn[1]}`;
  return name;
}

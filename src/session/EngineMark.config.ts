/**
 * .what = the one-character marks an engine announces itself with
 */
export type EngineMark = 'p' | 'x' | 'l';

export type EngineName = 'pdftex' | 'xetex' | 'luatex';

/**
 * .what = what the handshake tells us about the engine on the other end
 */
export interface EngineProfile {
  mark: EngineMark;
  name: EngineName;
  /**
   * whether the engine reads unicode code points; byte engines cannot take code points above 255
   */
  isUnicode: boolean;
}

/**
 * .what = engine profile per announced mark
 * .why = single source of truth for the handshake alphabet
 */
export const CONFIG_BY_ENGINE_MARK: Record<EngineMark, EngineProfile> = {
  p: { mark: 'p', name: 'pdftex', isUnicode: false },
  x: { mark: 'x', name: 'xetex', isUnicode: true },
  l: { mark: 'l', name: 'luatex', isUnicode: true },
};

const ENGINE_MARKS: readonly string[] = Object.keys(CONFIG_BY_ENGINE_MARK);

export const isEngineMark = (value: string): value is EngineMark =>
  ENGINE_MARKS.includes(value);

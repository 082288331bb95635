import { describe, it, expect } from 'vitest';
import {
  compose,
  image,
  imageRefs,
  map,
  mapRefs,
  parse,
  serialize,
  silent,
  speak,
  speakable,
  strip,
  validate,
} from '../tags.js';
import { ValidationError } from '../../utils/errors.js';

describe('serialize', () => {
  it('wraps speakable text and leaves silent text unmarked', () => {
    const text = serialize([speak('The Master Sword rests here.'), silent('Found in Korok Forest')]);
    expect(text).toBe('[SPEAK]The Master Sword rests here.[/SPEAK]\nFound in Korok Forest');
  });

  it('moves visual markers after the prose', () => {
    const text = serialize([image('http://x/sword.png'), speak('Behold.'), map('maps/surface_shrine.png')]);
    expect(text).toBe('[SPEAK]Behold.[/SPEAK]\n[IMAGE]http://x/sword.png[/IMAGE]\n[MAP]maps/surface_shrine.png[/MAP]');
  });

  it('removes marker tokens that appear inside content', () => {
    const text = serialize([speak('Say [/SPEAK] nothing [IMAGE]'), image('http://x/a.png[/IMAGE]')]);
    expect(text).toBe('[SPEAK]Say  nothing[/SPEAK]\n[IMAGE]http://x/a.png[/IMAGE]');
  });

  it('refuses a response with no prose', () => {
    expect(() => serialize([image('http://x/a.png')])).toThrow(ValidationError);
    expect(() => serialize([speak('  '), map('m.png')])).toThrow(ValidationError);
  });
});

describe('compose', () => {
  it('keeps each group in its original order', () => {
    const segments = compose([map('m1'), speak('one'), image('i1'), silent('two')]);
    expect(segments).toEqual([speak('one'), silent('two'), map('m1'), image('i1')]);
  });
});

describe('parse', () => {
  it('reads back what serialize wrote', () => {
    const segments = [speak('A Lynel roams here.'), silent('Drops: Lynel Hoof'), image('http://x/lynel.png')];
    expect(parse(serialize(segments))).toEqual(segments);
  });

  it('lets an unclosed speak span run to the end', () => {
    expect(parse('Hello [SPEAK]listen to me')).toEqual([silent('Hello'), speak('listen to me')]);
  });

  it('drops an unclosed image marker', () => {
    expect(parse('A picture: [IMAGE]http://x/a.png')).toEqual([silent('A picture:')]);
  });

  it('ignores a stray closer', () => {
    expect(parse('before[/MAP] after')).toEqual([silent('before'), silent('after')]);
  });

  it('closes a speak span implicitly at a nested opener', () => {
    expect(parse('[SPEAK]look [IMAGE]http://x/a.png[/IMAGE]')).toEqual([speak('look'), image('http://x/a.png')]);
  });
});

describe('strip', () => {
  it('keeps the prose and drops image and map references', () => {
    const text = '[SPEAK]Here is the map.[/SPEAK]\nThree shrines.\n[MAP]out/surface_shrine.png[/MAP]';
    expect(strip(text)).toBe('Here is the map.\nThree shrines.');
  });
});

describe('speakable', () => {
  it('joins only the spoken spans', () => {
    const text = '[SPEAK]First.[/SPEAK]\nnot spoken\n[SPEAK]Second.[/SPEAK]';
    expect(speakable(text)).toBe('First. Second.');
  });
});

describe('imageRefs and mapRefs', () => {
  it('collect marker payloads', () => {
    const text = '[SPEAK]x[/SPEAK]\n[IMAGE]http://x/a.png[/IMAGE]\n[MAP]m.png[/MAP]';
    expect(imageRefs(text)).toEqual(['http://x/a.png']);
    expect(mapRefs(text)).toEqual(['m.png']);
  });
});

describe('validate', () => {
  it('accepts anything serialize produces', () => {
    const outputs = [
      serialize([speak('A common enemy.'), image('http://x/bok.png')]),
      serialize([silent('display only'), map('m.png')]),
      serialize([speak('one'), speak('two'), silent('three')]),
    ];
    for (const output of outputs) {
      expect(validate(output)).toEqual([]);
    }
  });

  it('reports unclosed markers and missing prose', () => {
    expect(validate('[IMAGE]http://x/a.png')).toEqual([
      'unclosed [IMAGE] at 0',
      'no prose remains after stripping markers',
    ]);
  });

  it('reports a stray closer', () => {
    expect(validate('text[/SPEAK]')).toEqual(['stray [/SPEAK] at 4']);
  });
});

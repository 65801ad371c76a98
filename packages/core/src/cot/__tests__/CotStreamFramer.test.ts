import { CotStreamFramer } from '../CotStreamFramer';

describe('CotStreamFramer', () => {
  it('reassembles a message split across chunks', () => {
    const framer = new CotStreamFramer();

    expect(framer.push('<?xml version="1.0"?><event uid="a"><point/>')).toEqual([]);
    expect(framer.pending()).toBe(23);

    expect(framer.push('</event>  <event uid="b"/>')).toEqual([
      '<event uid="a"><point/></event>',
      '<event uid="b"/>',
    ]);
    expect(framer.pending()).toBe(0);
  });

  it('returns several messages from one chunk', () => {
    const framer = new CotStreamFramer();
    const one = '<event uid="1"><point lat="1" lon="2"/></event>';
    const two = '<event uid="2"><point lat="3" lon="4"/></event>';

    expect(framer.push(`${one}\n${two}\n`)).toEqual([one, two]);
  });

  it('does not mistake other tags for an event start', () => {
    const framer = new CotStreamFramer();

    expect(framer.push('<events><event uid="c"></event></events>')).toEqual(['<event uid="c"></event>']);
    expect(framer.pending()).toBe(6);
  });

  it('ignores ">" inside quoted attribute values', () => {
    const framer = new CotStreamFramer();

    expect(framer.push('<event uid="x>y" type="a"/>')).toEqual(['<event uid="x>y" type="a"/>']);
  });

  it('finds an event start split across chunks', () => {
    const framer = new CotStreamFramer();

    expect(framer.push('junk<ev')).toEqual([]);
    expect(framer.pending()).toBe(6);
    expect(framer.push('ent uid="d"/>')).toEqual(['<event uid="d"/>']);
  });

  it('drops an incomplete message that outgrows the buffer limit', () => {
    const framer = new CotStreamFramer({ maxBufferLength: 10 });

    expect(framer.push('<event uid="long-value"')).toEqual([]);
    expect(framer.pending()).toBe(0);
    expect(framer.getOverflowCount()).toBe(1);

    expect(framer.push('<event uid="e"/>')).toEqual(['<event uid="e"/>']);
    expect(framer.getOverflowCount()).toBe(1);
  });

  it('discards buffered input on reset', () => {
    const framer = new CotStreamFramer();
    framer.push('<event uid="f">');

    framer.reset();

    expect(framer.pending()).toBe(0);
    expect(framer.push('</event>')).toEqual([]);
  });
});

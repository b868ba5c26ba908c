import { frequency, hws, spiceIdentifier, time, unsignedInt, voltage } from "../parse/lexeme.js";
import { type Parser, alt, context, cut, failure, map, ok, opt, tagNoCase } from "../parse/result.js";
import type { AcCommand, AcSweep, DcCommand, SimCommand, TranCommand } from "./model.js";

function keyword(kw: string): Parser<string> {
  return context("keyword", hws(tagNoCase(kw)));
}

function committed<T>(label: string, p: Parser<T>): Parser<T> {
  return cut(context(label, hws(p)));
}

/** `.DC <source> <start> <stop> <step>` */
export const dcCommand: Parser<DcCommand> = context<DcCommand>("dc_command", (input) => {
  const kw = keyword(".DC")(input);
  if (!kw.ok) return kw;
  const src = committed("source_name", spiceIdentifier)(kw.rest);
  if (!src.ok) return src;
  const start = committed("start_value", voltage)(src.rest);
  if (!start.ok) return start;
  const stop = committed("stop_value", voltage)(start.rest);
  if (!stop.ok) return stop;
  const step = committed("step_value", voltage)(stop.rest);
  if (!step.ok) return step;
  return ok(step.rest, {
    kind: "dc",
    sourceName: src.value,
    start: start.value,
    stop: stop.value,
    step: step.value,
  });
});

const sweep: Parser<AcSweep> = alt<AcSweep>(
  map(tagNoCase("LIN"), (): AcSweep => "lin"),
  map(tagNoCase("DEC"), (): AcSweep => "dec"),
  map(tagNoCase("OCT"), (): AcSweep => "oct"),
);

/** `.AC LIN|DEC|OCT <points> <fstart> <fstop>` */
export const acCommand: Parser<AcCommand> = context<AcCommand>("ac_command", (input) => {
  const kw = keyword(".AC")(input);
  if (!kw.ok) return kw;
  const type = committed("sweep_type", sweep)(kw.rest);
  if (!type.ok) return type;
  const points = committed("points", unsignedInt)(type.rest);
  if (!points.ok) return points;
  const fStart = committed("f_start", frequency)(points.rest);
  if (!fStart.ok) return fStart;
  const fStop = committed("f_stop", frequency)(fStart.rest);
  if (!fStop.ok) return fStop;
  return ok(fStop.rest, {
    kind: "ac",
    sweep: type.value,
    points: points.value,
    fStart: fStart.value,
    fStop: fStop.value,
  });
});

/** `.TRAN <tstep> <tstop> [<tstart> [<tmax>]] [UIC]` */
export const tranCommand: Parser<TranCommand> = context<TranCommand>("tran_command", (input) => {
  const kw = keyword(".TRAN")(input);
  if (!kw.ok) return kw;
  const step = committed("t_step", time)(kw.rest);
  if (!step.ok) return step;
  const stop = committed("t_stop", time)(step.rest);
  if (!stop.ok) return stop;
  const start = context("t_start", opt(hws(time)))(stop.rest);
  if (!start.ok) return start;
  const max = context("t_max", opt(hws(time)))(start.rest);
  if (!max.ok) return max;
  const flag = context("UIC_flag", opt(hws(spiceIdentifier)))(max.rest);
  if (!flag.ok) return flag;
  if (flag.value !== undefined && flag.value.toUpperCase() !== "UIC") {
    return failure(flag.rest, "expected UIC or end of line");
  }
  const cmd: TranCommand = { kind: "tran", step: step.value, stop: stop.value, uic: flag.value !== undefined };
  if (start.value) cmd.start = start.value;
  if (max.value) cmd.max = max.value;
  return ok(flag.rest, cmd);
});

export const simCommand: Parser<SimCommand> = alt<SimCommand>(dcCommand, acCommand, tranCommand);

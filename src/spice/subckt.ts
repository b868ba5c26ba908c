import { comment, hws, node, spiceIdentifier } from "../parse/lexeme.js";
import { type Parser, context, cut, failure, many0, mismatch, ok, tagNoCase } from "../parse/result.js";
import { component } from "./components.js";
import type { Component, Instance, Subckt } from "./model.js";

/** `Xname pin... subckt`: the last token names the subcircuit. */
export const instance: Parser<Instance> = context<Instance>("instance", (input) => {
  const name = context("name", hws(spiceIdentifier))(input);
  if (!name.ok) return name;
  if (name.value[0]?.toUpperCase() !== "X") return mismatch(name.rest, "should begin with X");

  const args = context("args", many0(hws(node)))(name.rest);
  if (!args.ok) return args;
  const subcktName = args.value.at(-1);
  if (subcktName === undefined) return failure(args.rest, "missing subckt name");
  return ok(args.rest, { name: name.value, pins: args.value.slice(0, -1), subcktName });
});

const declaration: Parser<{ name: string; ports: string[] }> = context("subckt_decl", (input) => {
  const name = context("name", hws(spiceIdentifier))(input);
  if (!name.ok) return name;
  const ports = context("ports", many0(hws(node)))(name.rest);
  if (!ports.ok) return ports;
  return ok(ports.rest, { name: name.value, ports: ports.value });
});

/**
 * `.SUBCKT name ports...` followed by component and instance lines up to `.ENDS`.
 * Comment lines in the body are skipped.
 */
export const subckt: Parser<Subckt> = context<Subckt>("subckt", (input) => {
  const kw = context("keyword", hws(tagNoCase(".SUBCKT")))(input);
  if (!kw.ok) return kw;
  const decl = cut(context("declaration", hws(declaration)))(kw.rest);
  if (!decl.ok) return decl;

  const components: Component[] = [];
  const instances: Instance[] = [];
  let rest = decl.rest;
  for (;;) {
    rest = rest.trimStart();
    if (!rest) return failure(rest, "missing .ENDS");

    const c = comment(rest);
    if (c.ok) {
      rest = c.rest;
      continue;
    }

    if (rest.slice(0, 5).toLowerCase() === ".ends") {
      const nl = rest.indexOf("\n");
      rest = nl === -1 ? "" : rest.slice(nl + 1);
      break;
    }

    const comp = hws(component)(rest);
    if (comp.ok) {
      components.push(comp.value);
      rest = comp.rest;
      continue;
    }
    if (comp.fatal) return comp;

    const inst = hws(instance)(rest);
    if (inst.ok) {
      instances.push(inst.value);
      rest = inst.rest;
      continue;
    }
    if (inst.fatal) return inst;
    return failure(rest, "unknown line in subckt");
  }

  return ok(rest, { name: decl.value.name, ports: decl.value.ports, components, instances });
});

/**
 * MIR listings, used by `wispc mir` and as the content hashed into a
 * function's cache identity.
 */

import { CodeBuilder } from "../codegen/code-builder";
import { formatValue } from "../comptime/value";
import { formatType } from "../types/format";
import { MirFunction, Operand, Place, Rvalue, Terminator } from "./mir";

export function printPlace(p: Place): string {
  let out = `_${p.local}`;
  for (const proj of p.projections) {
    out = proj.kind === "field" ? `${out}.${proj.name}` : `${out}[${printOperand(proj.index)}]`;
  }
  return out;
}

export function printOperand(op: Operand): string {
  switch (op.kind) {
    case "copy":
      return printPlace(op.place);
    case "const":
      return formatValue(op.value);
    case "global":
      return `const ${op.name}`;
    case "site":
      return `comptime ${op.site}`;
  }
}

function printRvalue(rv: Rvalue): string {
  switch (rv.kind) {
    case "use":
      return printOperand(rv.operand);
    case "binary":
      return `${rv.op}(${printOperand(rv.left)}, ${printOperand(rv.right)})`;
    case "unary":
      return `${rv.op}(${printOperand(rv.operand)})`;
    case "aggregate":
      return printAggregate(rv);
    case "discriminant":
      return `discriminant(${printPlace(rv.place)})`;
    case "payload":
      return `payload(${printPlace(rv.place)}, ${rv.variant}, ${rv.index})`;
    case "cast":
      return `${printOperand(rv.operand)} as ${formatType(rv.to)}`;
  }
}

function printAggregate(rv: Extract<Rvalue, { kind: "aggregate" }>): string {
  const ops = rv.operands.map(printOperand);
  switch (rv.aggregate.kind) {
    case "struct": {
      const fields = rv.aggregate.fields.map((f, i) => `${f}: ${ops[i]}`);
      return `${formatType(rv.aggregate.type)} { ${fields.join(", ")} }`;
    }
    case "enum":
      return `${formatType(rv.aggregate.type)}::${rv.aggregate.name}(${ops.join(", ")})`;
    case "array":
      return `[${ops.join(", ")}]`;
  }
}

function printTerminator(term: Terminator): string {
  switch (term.kind) {
    case "goto":
      return `goto -> bb${term.target}`;
    case "switch": {
      const arms = term.cases.map((c) => `${c.value} => bb${c.target}`).join(", ");
      return `switch(${printOperand(term.discr)}) -> [${arms}; otherwise: bb${term.otherwise}]`;
    }
    case "return":
      return "return";
    case "call": {
      const marker = term.comptime ? "comptime " : "";
      return `${printPlace(term.destination)} = ${marker}${printOperand(term.callee)}(${term.args.map(printOperand).join(", ")}) -> bb${term.target}`;
    }
    case "intrinsic":
      return `${printPlace(term.destination)} = #${term.name}(${term.args.map(printOperand).join(", ")}) -> bb${term.target}`;
    case "unreachable":
      return `unreachable(${term.reason})`;
  }
}

export function printFunction(fn: MirFunction): string {
  const builder = new CodeBuilder();
  const params = fn.params.map((id) => `_${id}: ${formatType(fn.locals[id].type)}`).join(", ");
  builder.block(`fn ${fn.id}(${params}) -> ${formatType(fn.returnType)} {`, () => {
    for (const local of fn.locals) {
      builder.line(`let _${local.id}: ${formatType(local.type)}; // ${local.name}`);
    }
    for (const block of fn.blocks) {
      builder.line();
      builder.block(`bb${block.id}: {`, () => {
        for (const stmt of block.statements) {
          builder.line(`${printPlace(stmt.place)} = ${printRvalue(stmt.rvalue)};`);
        }
        builder.line(printTerminator(block.terminator) + ";");
      });
    }
  });
  return builder.build();
}

import { ValidationError } from "../runtime/errors.js";

/**
 * How a render tool is driven over its control channel. Everything that is
 * specific to one program's command language lives here.
 */
export interface RenderDialect {
  readonly name: string;
  /** A command that makes the tool print `token` on a line of its own. */
  echo(token: string): string;
  readonly quit: string;
  /** True for output lines that report a failed command. */
  isError(line: string): boolean;
  saveImage(path: string, width: number, height: number, transparent: boolean): string;
}

const CHIMERAX_ERROR = /^(?:Error\b|Traceback\b|.*\bError:\s)|^Unknown command\b/i;

export const chimeraxDialect: RenderDialect = {
  name: "chimerax",
  echo: (token) => `echo ${token}`,
  quit: "exit",
  isError: (line) => CHIMERAX_ERROR.test(line),
  saveImage: (path, width, height, transparent) =>
    `save ${quotePath(path)} width ${width} height ${height} supersample 3 transparentBackground ${transparent ? "true" : "false"}`
};

export type Axis = "x" | "y" | "z";
export type Representation = "surface" | "cartoon" | "stick" | "sphere";

export const REPRESENTATIONS: readonly Representation[] = ["surface", "cartoon", "stick", "sphere"];

/** One residue in the viewer's atom-spec syntax, e.g. `/A:25` or `/B:100A`. */
export interface ResidueSpec {
  chainId: string;
  seq: number;
  iCode?: string;
}

export function quotePath(path: string): string {
  if (/["\r\n]/.test(path)) throw new ValidationError(`unsupported characters in path '${path}'`);
  return /\s/.test(path) ? `"${path}"` : path;
}

export function residueSpec(r: ResidueSpec): string {
  if (!/^[A-Za-z0-9]{1,4}$/.test(r.chainId)) throw new ValidationError(`invalid chain id '${r.chainId}'`);
  if (!Number.isInteger(r.seq)) throw new ValidationError(`invalid residue number ${r.seq}`);
  return `/${r.chainId}:${r.seq}${r.iCode ?? ""}`;
}

const RESIDUE_LABEL = /^([A-Za-z0-9]{1,4}):(?:[A-Za-z]{3})?(-?\d+)([A-Za-z]?)$/;

/** Accepts `A:25`, `A:25B` and pocket labels such as `A:ASP25`; the residue name is ignored. */
export function parseResidueLabel(label: string): ResidueSpec {
  const m = RESIDUE_LABEL.exec(label.trim());
  if (!m) throw new ValidationError(`unrecognized residue '${label}', expected e.g. A:25 or A:ASP25`);
  return { chainId: m[1], seq: Number(m[2]), iCode: m[3] };
}

/** `/A:25,30/B:7`: residues grouped by chain in first-seen order. */
export function residueListSpec(residues: readonly ResidueSpec[]): string {
  if (residues.length === 0) throw new ValidationError("at least one residue is required");
  const byChain = new Map<string, string[]>();
  for (const r of residues) {
    const spec = residueSpec(r);
    const numbers = spec.slice(spec.indexOf(":") + 1);
    const list = byChain.get(r.chainId);
    if (list) list.push(numbers);
    else byChain.set(r.chainId, [numbers]);
  }
  return Array.from(byChain, ([chain, numbers]) => `/${chain}:${numbers.join(",")}`).join("");
}

const COLOR = /^(?:[a-z]+|#[0-9a-f]{6})$/i;

export function checkColor(color: string): string {
  if (!COLOR.test(color)) throw new ValidationError(`invalid color '${color}'`);
  return color.toLowerCase();
}

export function openStructureScript(path: string): string {
  return ["close all", `open ${quotePath(path)} format pdb`, "lighting soft", "set bgColor white", "view"].join("\n");
}

export function rotateScript(axis: Axis, angle: number): string {
  if (!Number.isFinite(angle)) throw new ValidationError(`invalid angle ${angle}`);
  return `turn ${axis} ${angle}`;
}

export function representationScript(representation: Representation, transparency: number): string {
  switch (representation) {
    case "surface":
      return ["hide atoms", "surface", `transparency ${Math.round(transparency * 100)}`].join("\n");
    case "cartoon":
      return ["hide atoms", "surface hide", "cartoon"].join("\n");
    case "stick":
    case "sphere":
      return ["surface hide", `style ${representation}`, "show atoms"].join("\n");
  }
}

export function mutateScript(residue: ResidueSpec, newName: string): string {
  const spec = residueSpec(residue);
  return [`swapaa ${spec} ${newName}`, `color ${spec} magenta`, `label ${spec}`].join("\n");
}

export function highlightScript(residues: readonly ResidueSpec[], color: string): string {
  const spec = residueListSpec(residues);
  return [`show ${spec} atoms`, `style ${spec} stick`, `color ${spec} ${checkColor(color)}`, `label ${spec}`].join("\n");
}

/** Opens a staged ligand pose beside the loaded receptor and frames both. */
export function showPoseScript(path: string, color = "lime"): string {
  return [`open ${quotePath(path)} format pdb`, "style :LIG stick", `color :LIG ${checkColor(color)}`, "show :LIG atoms", "view :LIG"].join("\n");
}

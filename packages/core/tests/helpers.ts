import * as fs from 'fs';
import * as path from 'path';
import { tokenize } from '../src/parsing/lexer';
import { parse } from '../src/parsing/parser';
import type { ProcedureDecl, Program } from '../src/parsing/ast';

export const fixturesPath = path.join(__dirname, 'fixtures');

export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(fixturesPath, name), 'utf8');
}

export function parseSource(source: string): Program {
  return parse(tokenize(source));
}

export function procedureNamed(program: Program, name: string): ProcedureDecl {
  const procedure = program.procedures.find(candidate => candidate.name === name);
  if (!procedure) {
    throw new Error(`No procedure ${name} in fixture`);
  }
  return procedure;
}

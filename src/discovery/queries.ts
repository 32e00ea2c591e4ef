import type { FinderConfig } from "../config.js";

export function guessDomainLabel(name: string): string {
  return name.toLowerCase().replace(/[\s.]/g, "");
}

function fillTemplate(template: string, name: string, targetYears: string[]): string {
  return template
    .replace(/\{name\}/g, name)
    .replace(/\{domain_guess\}/g, guessDomainLabel(name))
    .replace(/\{year:(\d+)\}/g, (_, index: string) => {
      return targetYears[parseInt(index, 10)] ?? targetYears[0] ?? "";
    });
}

export function buildSearchQueries(name: string, config: FinderConfig): string[] {
  return [
    ...new Set(
      config.search.queries.map((template) =>
        fillTemplate(template, name, config.target_years)
      )
    ),
  ];
}

export function buildWebsiteQuery(name: string): string {
  return `${name} official website investor`;
}

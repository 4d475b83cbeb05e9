import { QueryPlan } from '../ir/types.js';
import { describeFilter } from './answer.js';

export function explainPlan(plan: QueryPlan): string {
  const lines: string[] = [];
  lines.push('Interpretação da pergunta:');
  lines.push(
    plan.intentSource === 'keyword'
      ? `- Intenção: ${plan.intent} (palavra-chave "${plan.cue}")`
      : `- Intenção: ${plan.intent} (padrão, nenhuma palavra-chave reconhecida)`
  );
  lines.push(`- Coluna alvo: ${plan.targetColumn ?? 'não identificada'}`);
  if (plan.filters.length) {
    lines.push('- Filtros: ' + plan.filters.map(describeFilter).join(' E '));
  } else {
    lines.push('- Filtros: nenhum (todas as linhas)');
  }
  if (plan.skipped.length) {
    lines.push('- Trechos ignorados: ' + plan.skipped.map((s) => `"${s}"`).join(', '));
  }
  return lines.join('\n');
}

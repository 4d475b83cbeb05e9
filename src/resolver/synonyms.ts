/** User phrasing → column name. Targets missing from the uploaded sheet are ignored. */
export type SynonymTable = Record<string, string>;

export const DEFAULT_SYNONYMS: SynonymTable = {
  'cor do veiculo': 'cor_veiculo',
  'marca do veiculo': 'marca_veiculo',
  'modelo do veiculo': 'modelo_veiculo',
  'valor da nota': 'valor_nota',
  'numero da nota': 'numero_nota',
  'data de emissao': 'data_emissao',
  'cliente': 'nome_cliente',
  'placa': 'placa_veiculo',
  // add more as you learn user phrasing
};

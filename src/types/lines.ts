/**
 * Invoice line in the Bling import layout. Every value is a string, as the
 * sheet stores it.
 */
export type Line = Record<string, string>;

/**
 * Bling import columns, in sheet order
 */
export const BLING_COLUMNS = [
  'Número pedido',
  'Nome Comprador',
  'Data',
  'Data Pedido',
  'CPF/CNPJ Comprador',
  'Endereço Comprador',
  'Bairro Comprador',
  'Número Comprador',
  'Complemento Comprador',
  'CEP Comprador',
  'Cidade Comprador',
  'UF Comprador',
  'Telefone Comprador',
  'Celular Comprador',
  'E-mail Comprador',
  'Produto',
  'SKU',
  'Un',
  'Quantidade',
  'Valor Unitário',
  'Valor Total',
  'Total Pedido',
  'Valor Frete Pedido',
  'Valor Desconto Pedido',
  'Outras despesas',
  'Nome Entrega',
  'Endereço Entrega',
  'Número Entrega',
  'Complemento Entrega',
  'Cidade Entrega',
  'UF Entrega',
  'CEP Entrega',
  'Bairro Entrega',
  'Transportadora',
  'Serviço',
  'Tipo Frete',
  'Observações',
  'Qtd Parcela',
  'Data Prevista',
  'Vendedor',
  'Forma Pagamento',
  'ID Forma Pagamento',
  'transaction_id',
  'subscription_id',
  'product_id',
  'Plano Assinatura',
  'Cupom',
  'periodicidade',
  'periodo',
  'indisponivel',
  'ID Lote',
  'dedup_id',
] as const;

const UNAVAILABLE_MARKS = new Set(['s', 'sim', 'true', '1', 'y', 'yes']);

/**
 * Order a line by the Bling layout: missing columns become "", extra fields
 * are kept after the standard ones, and `indisponivel` is "S" or "".
 */
export function standardizeLine(line: Line): Line {
  const out: Line = {};
  for (const column of BLING_COLUMNS) {
    out[column] = line[column] ?? '';
  }
  for (const [key, value] of Object.entries(line)) {
    if (!(key in out)) {
      out[key] = value;
    }
  }
  out.indisponivel = UNAVAILABLE_MARKS.has((out.indisponivel ?? '').trim().toLowerCase()) ? 'S' : '';
  return out;
}

const TAMANHO_CNPJ = 14;

/**
 * Normaliza um CNPJ para 14 dígitos, completando com zeros à esquerda.
 *
 * @returns O CNPJ normalizado ou null se não houver dígitos, se houver mais
 * de 14 dígitos ou se todos forem zero.
 */
export function normalizarCnpj(cnpj: string | number | null | undefined): string | null {
  if (cnpj === null || cnpj === undefined) {
    return null;
  }

  const digitos = String(cnpj).replace(/\D/g, '');
  if (digitos.length === 0 || digitos.length > TAMANHO_CNPJ) {
    return null;
  }

  const normalizado = digitos.padStart(TAMANHO_CNPJ, '0');
  return /^0+$/.test(normalizado) ? null : normalizado;
}

/**
 * Aplica a máscara XX.XXX.XXX/XXXX-XX. Valores que não normalizam para um
 * CNPJ são devolvidos como vieram.
 */
export function formatarCnpj(cnpj: string): string {
  const digitos = normalizarCnpj(cnpj);
  if (!digitos) {
    return cnpj;
  }

  return digitos.replace(
    /(\d{2})(\d{3})(\d{3})(\d{4})(\d{2})/,
    '$1.$2.$3/$4-$5'
  );
}

/**
 * Mantém apenas dígitos, com um `+` inicial quando o valor começa por `+`.
 * Retorna string vazia quando não há dígitos.
 */
export function normalizarTelefone(bruto: string): string {
  const digitos = bruto.replace(/\D/g, '');
  if (!digitos) {
    return '';
  }
  return bruto.trim().startsWith('+') ? `+${digitos}` : digitos;
}

const CODIGO_PAIS_BRASIL = '55';

/**
 * Número usado no link do WhatsApp: só dígitos, com o código do país
 * quando o número é nacional (DDD + 8 ou 9 dígitos).
 */
export function normalizarNumeroWhatsApp(bruto: string): string {
  const digitos = bruto.replace(/\D/g, '');
  if (digitos.length === 10 || digitos.length === 11) {
    return `${CODIGO_PAIS_BRASIL}${digitos}`;
  }
  return digitos;
}

/**
 * Normaliza um e-mail: remove `mailto:`, parâmetros e ponto final, e deixa
 * o domínio em minúsculas. Retorna string vazia se não houver local@domínio.
 */
export function normalizarEmail(bruto: string): string {
  let email = bruto.trim().replace(/^mailto:/i, '');

  const inicioQuery = email.indexOf('?');
  if (inicioQuery >= 0) {
    email = email.slice(0, inicioQuery);
  }

  email = email.trim().replace(/\.+$/, '');

  const arroba = email.lastIndexOf('@');
  if (arroba <= 0 || arroba === email.length - 1) {
    return '';
  }

  const local = email.slice(0, arroba);
  const dominio = email.slice(arroba + 1).toLowerCase();
  return `${local}@${dominio}`;
}

export interface MessageContext {
  playerName: string;
  ruleName: string;
  value: number;
  previousValue: number | null;
  champion: string;
  percentile: number | null;
}

export const formatStatValue = (value: number) => (Number.isInteger(value) ? String(value) : value.toFixed(2));

/** Substitutes known `{placeholder}` tokens; unknown tokens are left as written. */
export const renderMessage = (template: string, context: MessageContext) => {
  const values: Record<string, string> = {
    player_name: context.playerName,
    rule_name: context.ruleName,
    value: formatStatValue(context.value),
    previous_value: context.previousValue === null ? 'n/a' : formatStatValue(context.previousValue),
    champion: context.champion,
    percentile: context.percentile === null ? 'n/a' : context.percentile.toFixed(1),
  };

  return template.replace(/\{([a-z_]+)\}/g, (token, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : token
  );
};

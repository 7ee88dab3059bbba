export const PATTERNS = {
    // {{ anything }}, the outer envelope of every expression; an empty {{}} is plain text
    EXPRESSION: /\{\{\s*([^}]+?)\s*\}\}/g,

    // env_var('NAME') or env_var("NAME")
    ENV_CALL: /^env_var\(\s*(['"])([^'"]+)\1\s*\)$/,

    // var('NAME') or var("NAME")
    VAR_CALL: /^var\(\s*(['"])([^'"]+)\1\s*\)$/,

    // recipe.name
    RECIPE_ATTR: /^recipe\.([A-Za-z_][\w]*)$/,
};

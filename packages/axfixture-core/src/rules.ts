/**
 * Attribute mapping tables.
 *
 * Each table is an ordered, exhaustive list of rules. A rule names the source
 * key, the target key, how the value is converted and when the rule fires.
 * Tables are applied in the order of ATTRIBUTE_TABLES, rules in list order.
 */

/** How a matched value is carried over */
export type AttributeKind = "copy" | "integer" | "color";

/**
 * "present": fires whenever the source key exists.
 * "truthy": fires only when the source value is truthy; false and absent both
 * mean "no target key".
 */
export type AttributeGate = "present" | "truthy";

export interface AttributeRule {
    readonly source: string;
    readonly target: string;
    readonly kind: AttributeKind;
    readonly gate: AttributeGate;
}

function rule(kind: AttributeKind, gate: AttributeGate) {
    return (source: string, target: string = source): AttributeRule => ({
        source,
        target,
        kind,
        gate,
    });
}

const copy = rule("copy", "present");
const flag = rule("copy", "truthy");
const integer = rule("integer", "present");
const color = rule("color", "present");

export const ROLE_RENAMES: ReadonlyMap<string, string> = new Map([["popUpButton", "popupButton"]]);

export function translateRole(role: string): string {
    return ROLE_RENAMES.get(role) ?? role;
}

/** Rename-on-presence: value copied unchanged */
export const PRESENCE_RULES: readonly AttributeRule[] = [
    copy("name"),
    copy("nameFrom"),
    copy("description"),
    copy("descriptionFrom"),
    copy("selected"),
    copy("grabbed"),
    copy("characterOffsets"),
    copy("accessKey"),
    copy("autoComplete"),
    copy("checkedState"),
    copy("checkedStateDescription"),
    copy("childTreeId", "childTree"),
    copy("className"),
    copy("containerLiveRelevant"),
    copy("containerLiveStatus"),
    copy("display", "cssDisplay"),
    copy("fontFamily"),
    copy("htmlTag"),
    copy("innerHtml"),
    copy("inputType"),
    copy("keyShortcuts"),
    copy("language"),
    copy("liveRelevant"),
    copy("liveStatus"),
    copy("placeholder"),
    copy("role", "customRole"),
    copy("roleDescription"),
    copy("tooltip"),
    copy("url"),
    copy("defaultActionVerb"),
    copy("sortDirection"),
    copy("ariaCurrentState", "ariaCurrent"),
    copy("haspopup", "hasPopup"),
    copy("listStyle"),
    copy("text-align", "textAlign"),
    copy("valueForRange"),
    copy("minValueForRange"),
    copy("maxValueForRange"),
    copy("stepValueForRange"),
    copy("fontSize"),
    copy("fontWeight"),
    copy("textIndent"),
    copy("indirectChildIds", "indirectChildren"),
    copy("controlsIds", "controls"),
    copy("detailsIds", "details"),
    copy("describedbyIds", "describedBy"),
    copy("flowtoIds", "flowTo"),
    copy("labelledbyIds", "labelledBy"),
    copy("radioGroupIds", "radioGroups"),
    copy("textOverlineStyle", "overline"),
    copy("textStrikethroughStyle", "strikethrough"),
    copy("textUnderlineStyle", "underline"),
];

/** Truthy-gated flags */
export const TRUTHY_RULES: readonly AttributeRule[] = [
    flag("value"),
    flag("autofillAvailable"),
    flag("default"),
    flag("editable"),
    flag("focusable"),
    flag("hovered"),
    flag("ignored"),
    flag("invisible"),
    flag("linked"),
    flag("multiline"),
    flag("multiselectable"),
    flag("protected"),
    flag("required"),
    flag("visited"),
    flag("busy"),
    flag("nonatomicTextFieldRoot"),
    flag("containerLiveAtomic"),
    flag("containerLiveBusy"),
    flag("liveAtomic"),
    flag("modal"),
    flag("canvasHasFallback"),
    flag("scrollable"),
    flag("clickable"),
    flag("clipsChildren"),
    flag("notUserSelectableStyle"),
    flag("selectedFromFocus"),
    flag("isLineBreakingObject"),
    flag("isPageBreakingObject"),
    flag("hasAriaAttribute"),
    flag("touchPassThrough"),
];

/** Counts, indices and node references given as numeric strings */
export const INTEGER_RULES: readonly AttributeRule[] = [
    integer("scrollX"),
    integer("scrollXMin"),
    integer("scrollXMax"),
    integer("scrollY"),
    integer("scrollYMin"),
    integer("scrollYMax"),
    integer("ariaColumnCount"),
    integer("ariaCellColumnIndex"),
    integer("ariaCellColumnSpan"),
    integer("ariaRowCount"),
    integer("ariaCellRowIndex"),
    integer("ariaCellRowSpan"),
    integer("tableRowCount"),
    integer("tableColumnCount"),
    integer("tableHeaderId", "tableHeader"),
    integer("tableRowIndex"),
    integer("tableRowHeaderId", "tableRowHeader"),
    integer("tableColumnIndex"),
    integer("tableColumnHeaderId", "tableColumnHeader"),
    integer("tableCellColumnIndex"),
    integer("tableCellColumnSpan"),
    integer("tableCellRowIndex"),
    integer("tableCellRowSpan"),
    integer("hierarchicalLevel"),
    integer("activedescendantId", "activeDescendant"),
    integer("errormessageId", "errorMessage"),
    integer("inPageLinkTargetId", "inPageLinkTarget"),
    integer("memberOfId", "memberOf"),
    integer("nextOnLineId", "nextOnLine"),
    integer("popupForId", "popupFor"),
    integer("previousOnLineId", "previousOnLine"),
    integer("setSize"),
    integer("posInSet"),
    integer("previousFocusId", "previousFocus"),
    integer("nextFocusId", "nextFocus"),
];

export const COLOR_RULES: readonly AttributeRule[] = [
    color("colorValue"),
    color("backgroundColor"),
    color("color", "foregroundColor"),
];

export const ATTRIBUTE_TABLES: readonly (readonly AttributeRule[])[] = [
    PRESENCE_RULES,
    TRUTHY_RULES,
    INTEGER_RULES,
    COLOR_RULES,
];

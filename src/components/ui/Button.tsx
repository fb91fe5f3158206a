import React from "react";

type ButtonVariant = "default" | "primary" | "ghost";
type ButtonSize = "sm" | "md";

export interface ButtonProps
  extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: ButtonVariant;
  size?: ButtonSize;
}

export const Button = React.forwardRef<HTMLButtonElement, ButtonProps>(
  (
    { variant = "default", size = "md", className = "", children, type = "button", ...rest },
    ref
  ) => {
    const cls = ["btn", `btn-${variant}`, size === "sm" ? "btn-sm" : "", className]
      .filter(Boolean)
      .join(" ");
    return (
      <button ref={ref} type={type} className={cls} {...rest}>
        {children}
      </button>
    );
  }
);

Button.displayName = "Button";

export default Button;
